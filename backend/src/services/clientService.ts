import { Db } from '../db/database';
import { ClientData, ClientSchema } from '../models/schemas';
import { Client, Page, Result, TenantActor } from '../models/structures';
import { nowIso } from '../utils/dates';
import { normalizeCep } from '../utils/documents';
import { likePattern } from '../utils/text';
import { err, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

export interface ClientRow {
  id: number;
  company_id: number;
  name: string;
  phone: string;
  email: string;
  document: string;
  cep: string;
  street: string;
  number: string;
  district: string;
  city: string;
  created_at: string;
}

export const toClient = (row: ClientRow): Client => ({
  id: row.id,
  companyId: row.company_id,
  name: row.name,
  phone: row.phone,
  email: row.email,
  document: row.document,
  cep: row.cep,
  street: row.street,
  number: row.number,
  district: row.district,
  city: row.city,
  createdAt: row.created_at
});

const CLIENT_NOT_FOUND = 'Cliente não encontrado.';

export function findClient(db: Db, actor: TenantActor, id: number): Client | null {
  const row = db
    .prepare<unknown[], ClientRow>('SELECT * FROM clients WHERE id = ? AND company_id = ?')
    .get(id, actor.company.id);
  return row ? toClient(row) : null;
}

export function insertClient(
  db: Db,
  actor: TenantActor,
  data: Pick<ClientData, 'name' | 'phone'> & Partial<ClientData>
): Client {
  const info = db
    .prepare(
      `INSERT INTO clients (company_id, name, phone, email, document, cep, street, number, district, city, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      actor.company.id,
      data.name.trim().toUpperCase(),
      data.phone,
      data.email ?? '',
      data.document ?? '',
      data.cep ?? '',
      data.street ?? '',
      data.number ?? '',
      data.district ?? '',
      data.city ?? '',
      nowIso()
    );
  const client = findClient(db, actor, Number(info.lastInsertRowid));
  if (!client) throw new Error('client insert did not persist');
  return client;
}

function parseClient(input: unknown): Result<ClientData> {
  const parsed = validate(ClientSchema, input);
  if (!parsed.ok) return parsed;
  const cep = normalizeCep(parsed.data.cep);
  if (!cep.ok) return cep;
  return ok({ ...parsed.data, name: parsed.data.name.toUpperCase(), cep: cep.data });
}

// LIST clients (name, phone or email search)
export function listClients(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; page?: unknown }
): Page<Client> {
  const page = pageNumber(query.page);
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE company_id = ? AND (name LIKE ? ESCAPE '\\' OR phone LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\')`
    : 'WHERE company_id = ?';
  const params: unknown[] = pattern
    ? [actor.company.id, pattern, pattern, pattern]
    : [actor.company.id];

  const total = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM clients ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], ClientRow>(
      `SELECT * FROM clients ${where} ORDER BY name LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));
  return toPage(rows.map(toClient), total?.n ?? 0, page);
}

// GET one client
export function getClient(db: Db, actor: TenantActor, id: number): Result<Client> {
  const client = findClient(db, actor, id);
  return client ? ok(client) : err('CLIENT_NOT_FOUND', CLIENT_NOT_FOUND);
}

// CREATE a client
export function createClient(db: Db, actor: TenantActor, input: unknown): Result<Client> {
  const parsed = parseClient(input);
  if (!parsed.ok) return parsed;
  return ok(insertClient(db, actor, parsed.data));
}

// UPDATE a client
export function updateClient(db: Db, actor: TenantActor, id: number, input: unknown): Result<Client> {
  if (!findClient(db, actor, id)) return err('CLIENT_NOT_FOUND', CLIENT_NOT_FOUND);
  const parsed = parseClient(input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  db.prepare(
    `UPDATE clients SET name = ?, phone = ?, email = ?, document = ?, cep = ?, street = ?,
       number = ?, district = ?, city = ?
     WHERE id = ? AND company_id = ?`
  ).run(
    data.name,
    data.phone,
    data.email,
    data.document,
    data.cep,
    data.street,
    data.number,
    data.district,
    data.city,
    id,
    actor.company.id
  );
  return getClient(db, actor, id);
}

// DELETE a client; vehicles, appointments and orders go with it
export function deleteClient(db: Db, actor: TenantActor, id: number): Result<{ deletedId: number }> {
  const info = db
    .prepare('DELETE FROM clients WHERE id = ? AND company_id = ?')
    .run(id, actor.company.id);
  if (info.changes === 0) return err('CLIENT_NOT_FOUND', CLIENT_NOT_FOUND);
  return ok({ deletedId: id });
}
