import { Db } from '../db/database';
import { VehicleData, VehicleSchema } from '../models/schemas';
import { Page, Result, TenantActor, Vehicle, VehicleType, VEHICLE_TYPES } from '../models/structures';
import brands from '../data/vehicleBrands.json';
import { nowIso } from '../utils/dates';
import { normalizeVehicleYear } from '../utils/documents';
import { capitalizeWords, likePattern } from '../utils/text';
import { findClient } from './clientService';
import { err, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

export interface VehicleRow {
  id: number;
  company_id: number;
  client_id: number;
  type: VehicleType;
  plate: string;
  brand: string;
  model: string;
  year: string;
  color: string;
  km: number | null;
  created_at: string;
}

export const toVehicle = (row: VehicleRow): Vehicle => ({
  id: row.id,
  companyId: row.company_id,
  clientId: row.client_id,
  type: row.type,
  plate: row.plate,
  brand: row.brand,
  model: row.model,
  year: row.year,
  color: row.color,
  km: row.km,
  createdAt: row.created_at
});

// Helpers:
// Plates are compared trimmed and upper-cased
export function normalizePlate(p: string): string {
  return (p || '').trim().toUpperCase();
}

const VEHICLE_NOT_FOUND = 'Veículo não encontrado.';
const DUPLICATE_PLATE = 'Já existe um veículo com esta placa.';

export function findVehicle(db: Db, actor: TenantActor, id: number): Vehicle | null {
  const row = db
    .prepare<unknown[], VehicleRow>('SELECT * FROM vehicles WHERE id = ? AND company_id = ?')
    .get(id, actor.company.id);
  return row ? toVehicle(row) : null;
}

export function findVehicleByPlate(db: Db, actor: TenantActor, plate: string): Vehicle | null {
  const row = db
    .prepare<unknown[], VehicleRow>('SELECT * FROM vehicles WHERE plate = ? AND company_id = ?')
    .get(normalizePlate(plate), actor.company.id);
  return row ? toVehicle(row) : null;
}

export function insertVehicle(
  db: Db,
  actor: TenantActor,
  data: Omit<VehicleData, 'km'> & { km?: number | null }
): Vehicle {
  const info = db
    .prepare(
      `INSERT INTO vehicles (company_id, client_id, type, plate, brand, model, year, color, km, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      actor.company.id,
      data.clientId,
      data.type,
      normalizePlate(data.plate),
      data.brand,
      data.model,
      data.year,
      data.color,
      data.km ?? null,
      nowIso()
    );
  const vehicle = findVehicle(db, actor, Number(info.lastInsertRowid));
  if (!vehicle) throw new Error('vehicle insert did not persist');
  return vehicle;
}

function parseVehicle(db: Db, actor: TenantActor, input: unknown): Result<VehicleData> {
  const parsed = validate(VehicleSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  if (!findClient(db, actor, data.clientId)) return err('CLIENT_NOT_FOUND', 'Cliente não encontrado.');
  const year = normalizeVehicleYear(data.year);
  if (!year.ok) return year;

  return ok({
    ...data,
    plate: normalizePlate(data.plate),
    model: capitalizeWords(data.model),
    color: capitalizeWords(data.color),
    year: year.data
  });
}

// Service functions:
// LIST vehicles (plate, client name or model search)
export function listVehicles(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; page?: unknown }
): Page<Vehicle & { clientName: string }> {
  const page = pageNumber(query.page);
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE v.company_id = ? AND (v.plate LIKE ? ESCAPE '\\' OR c.name LIKE ? ESCAPE '\\' OR v.model LIKE ? ESCAPE '\\')`
    : 'WHERE v.company_id = ?';
  const params: unknown[] = pattern
    ? [actor.company.id, pattern, pattern, pattern]
    : [actor.company.id];
  const from = 'FROM vehicles v JOIN clients c ON c.id = v.client_id';

  const total = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n ${from} ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], VehicleRow & { client_name: string }>(
      `SELECT v.*, c.name AS client_name ${from} ${where} ORDER BY v.plate LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));
  return toPage(
    rows.map((row) => ({ ...toVehicle(row), clientName: row.client_name })),
    total?.n ?? 0,
    page
  );
}

// GET one vehicle
export function getVehicle(db: Db, actor: TenantActor, id: number): Result<Vehicle> {
  const vehicle = findVehicle(db, actor, id);
  return vehicle ? ok(vehicle) : err('VEHICLE_NOT_FOUND', VEHICLE_NOT_FOUND);
}

// CREATE a new vehicle
export function createVehicle(db: Db, actor: TenantActor, input: unknown): Result<Vehicle> {
  const parsed = parseVehicle(db, actor, input);
  if (!parsed.ok) return parsed;

  // Prevent duplicates (plates are unique per company)
  if (findVehicleByPlate(db, actor, parsed.data.plate)) {
    return err('DUPLICATE_LICENSE_PLATE', DUPLICATE_PLATE);
  }
  return ok(insertVehicle(db, actor, parsed.data));
}

// EDIT an existing vehicle
export function updateVehicle(db: Db, actor: TenantActor, id: number, input: unknown): Result<Vehicle> {
  if (!findVehicle(db, actor, id)) return err('VEHICLE_NOT_FOUND', VEHICLE_NOT_FOUND);
  const parsed = parseVehicle(db, actor, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  // Duplicate on other vehicle
  const duplicate = findVehicleByPlate(db, actor, data.plate);
  if (duplicate && duplicate.id !== id) return err('DUPLICATE_LICENSE_PLATE', DUPLICATE_PLATE);

  db.prepare(
    `UPDATE vehicles SET client_id = ?, type = ?, plate = ?, brand = ?, model = ?, year = ?,
       color = ?, km = ?
     WHERE id = ? AND company_id = ?`
  ).run(
    data.clientId,
    data.type,
    data.plate,
    data.brand,
    data.model,
    data.year,
    data.color,
    data.km,
    id,
    actor.company.id
  );
  return getVehicle(db, actor, id);
}

// DELETE a vehicle by id
export function deleteVehicle(db: Db, actor: TenantActor, id: number): Result<{ deletedId: number }> {
  const info = db
    .prepare('DELETE FROM vehicles WHERE id = ? AND company_id = ?')
    .run(id, actor.company.id);
  if (info.changes === 0) return err('VEHICLE_NOT_FOUND', VEHICLE_NOT_FOUND);
  return ok({ deletedId: id });
}

// Brand suggestions per vehicle type
export function listBrands(): Record<VehicleType, string[]> {
  const byType: Record<string, string[]> = brands;
  const result: Record<VehicleType, string[]> = { MOTO: [], CARRO: [], CAMINHAO: [] };
  for (const type of VEHICLE_TYPES) result[type] = [...(byType[type] ?? [])];
  return result;
}
