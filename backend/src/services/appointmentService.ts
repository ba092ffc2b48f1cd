import { Db } from '../db/database';
import { AppointmentSchema } from '../models/schemas';
import {
  Appointment,
  AppointmentType,
  APPOINTMENT_TYPE_LABELS,
  Err,
  APPOINTMENT_TYPES,
  Result,
  TenantActor,
  VEHICLE_TYPES,
  VehicleType
} from '../models/structures';
import { nowIso, parseDateInput, parseTimeInput, today } from '../utils/dates';
import { likePattern } from '../utils/text';
import { findClient, insertClient } from './clientService';
import { findVehicle, findVehicleByPlate, insertVehicle, normalizePlate } from './vehicleService';
import { err, ok, validate } from './common';

interface AppointmentRow {
  id: number;
  company_id: number;
  client_id: number;
  vehicle_id: number;
  date: string;
  time: string | null;
  type: AppointmentType;
  notes: string;
  created_at: string;
  client_name: string;
  client_phone: string;
  plate: string;
  model: string;
}

export interface AppointmentView extends Appointment {
  clientName: string;
  clientPhone: string;
  plate: string;
  model: string;
  typeLabel: string;
}

/** Calendar event as the agenda widget consumes it. */
export interface CalendarEvent {
  id: number;
  title: string;
  start: string;
  allDay: boolean;
  extendedProps: {
    cliente: string;
    veiculo: string;
    tipo: string;
    observacoes: string;
    hora: string;
  };
}

const toView = (row: AppointmentRow): AppointmentView => ({
  id: row.id,
  companyId: row.company_id,
  clientId: row.client_id,
  vehicleId: row.vehicle_id,
  date: row.date,
  time: row.time,
  type: row.type,
  notes: row.notes,
  createdAt: row.created_at,
  clientName: row.client_name,
  clientPhone: row.client_phone,
  plate: row.plate,
  model: row.model,
  typeLabel: APPOINTMENT_TYPE_LABELS[row.type] ?? row.type
});

export function toEvent(item: AppointmentView): CalendarEvent {
  return {
    id: item.id,
    title: `${item.clientName} - ${item.clientPhone}`,
    start: item.time ? `${item.date}T${item.time}:00` : item.date,
    allDay: !item.time,
    extendedProps: {
      cliente: item.clientName,
      veiculo: `${item.plate} - ${item.model}`,
      tipo: item.typeLabel,
      observacoes: item.notes,
      hora: item.time ?? ''
    }
  };
}

const SELECT_VIEW = `SELECT a.*, c.name AS client_name, c.phone AS client_phone, v.plate, v.model
  FROM appointments a
  JOIN clients c ON c.id = a.client_id
  JOIN vehicles v ON v.id = a.vehicle_id`;

const CONFLICT_MESSAGE =
  'Conflito: já existe um agendamento para esse cliente/veículo nesse dia/horário.';
const NOT_FOUND_MESSAGE = 'Agendamento não encontrado.';

function findView(db: Db, actor: TenantActor, id: number): AppointmentView | null {
  const row = db
    .prepare<unknown[], AppointmentRow>(`${SELECT_VIEW} WHERE a.id = ? AND a.company_id = ?`)
    .get(id, actor.company.id);
  return row ? toView(row) : null;
}

// One appointment per client, vehicle, day and time (null time = all day)
function hasConflict(
  db: Db,
  actor: TenantActor,
  slot: { clientId: number; vehicleId: number; date: string; time: string | null },
  exceptId = 0
): boolean {
  const row = db
    .prepare<unknown[], { id: number }>(
      `SELECT id FROM appointments
       WHERE company_id = ? AND client_id = ? AND vehicle_id = ? AND date = ?
         AND IFNULL(time, '') = IFNULL(?, '') AND id <> ?`
    )
    .get(actor.company.id, slot.clientId, slot.vehicleId, slot.date, slot.time, exceptId);
  return row !== undefined;
}

function insertAppointment(
  db: Db,
  actor: TenantActor,
  data: Omit<Appointment, 'id' | 'companyId' | 'createdAt'>
): Result<AppointmentView> {
  if (hasConflict(db, actor, data)) return err('SCHEDULE_CONFLICT', CONFLICT_MESSAGE);
  const info = db
    .prepare(
      `INSERT INTO appointments (company_id, client_id, vehicle_id, date, time, type, notes, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(actor.company.id, data.clientId, data.vehicleId, data.date, data.time, data.type, data.notes, nowIso());
  const view = findView(db, actor, Number(info.lastInsertRowid));
  return view ? ok(view) : err('APPOINTMENT_NOT_FOUND', NOT_FOUND_MESSAGE);
}

interface MonthRef {
  month: number;
  year: number;
}

export interface AgendaPage {
  events: CalendarEvent[];
  selectedDate: string | null;
  selected: AppointmentView[];
  month: number;
  year: number;
  prev: MonthRef;
  next: MonthRef;
  vehicles: { id: number; plate: string; model: string; clientId: number }[];
}

const toInt = (value: unknown, fallback: number) => {
  const parsed = Number.parseInt(String(value ?? ''), 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

// LIST the agenda: calendar events, the chosen day and month navigation
export function listAppointments(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; data?: unknown; mes?: unknown; ano?: unknown }
): AgendaPage {
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE a.company_id = ? AND (c.name LIKE ? ESCAPE '\\' OR v.plate LIKE ? ESCAPE '\\' OR v.model LIKE ? ESCAPE '\\')`
    : 'WHERE a.company_id = ?';
  const params: unknown[] = pattern
    ? [actor.company.id, pattern, pattern, pattern]
    : [actor.company.id];

  const matches = db
    .prepare<unknown[], AppointmentRow>(`${SELECT_VIEW} ${where} ORDER BY a.date, a.time, a.id`)
    .all(...params)
    .map(toView);

  const selectedDate = parseDateInput(query.data);
  // SQLite sorts NULL first, so all-day entries lead the day
  const selected = selectedDate ? matches.filter((item) => item.date === selectedDate) : [];

  const [baseYear, baseMonth] = (selectedDate ?? today()).split('-').map(Number);
  const month = toInt(query.mes, baseMonth);
  const year = toInt(query.ano, baseYear);

  const vehicles = db
    .prepare<unknown[], { id: number; plate: string; model: string; clientId: number }>(
      'SELECT id, plate, model, client_id AS clientId FROM vehicles WHERE company_id = ? ORDER BY plate'
    )
    .all(actor.company.id);

  return {
    events: matches.map(toEvent),
    selectedDate,
    selected,
    month,
    year,
    prev: month === 1 ? { month: 12, year: year - 1 } : { month: month - 1, year },
    next: month === 12 ? { month: 1, year: year + 1 } : { month: month + 1, year },
    vehicles
  };
}

// CREATE an appointment from the full form
export function createAppointment(db: Db, actor: TenantActor, input: unknown): Result<AppointmentView> {
  const parsed = validate(AppointmentSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  if (!findClient(db, actor, data.clientId)) return err('CLIENT_NOT_FOUND', 'Cliente não encontrado.');
  const vehicle = findVehicle(db, actor, data.vehicleId);
  if (!vehicle || vehicle.clientId !== data.clientId) {
    return err('VALIDATION_ERROR', 'Selecione um veículo do cliente escolhido.');
  }
  const date = parseDateInput(data.date);
  if (!date) return err('VALIDATION_ERROR', 'Data inválida.');
  let time: string | null = null;
  if (data.time) {
    time = parseTimeInput(data.time);
    if (!time) return err('VALIDATION_ERROR', 'Hora inválida.');
  }

  return insertAppointment(db, actor, {
    clientId: data.clientId,
    vehicleId: data.vehicleId,
    date,
    time,
    type: data.type,
    notes: data.notes
  });
}

const text = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

// MOVE an appointment (drag and drop on the calendar)
export function moveAppointment(db: Db, actor: TenantActor, input: unknown): Result<{ ok: true }> {
  const body = typeof input === 'object' && input !== null ? input : {};
  const id = Number(Reflect.get(body, 'id'));
  const rawDate = text(Reflect.get(body, 'date'));
  const rawTime = text(Reflect.get(body, 'time'));
  const allDay = Boolean(Reflect.get(body, 'allDay'));

  if (!Number.isInteger(id) || id <= 0 || !rawDate) {
    return err('VALIDATION_ERROR', 'Dados incompletos.');
  }
  const current = findView(db, actor, id);
  if (!current) return err('APPOINTMENT_NOT_FOUND', NOT_FOUND_MESSAGE);

  const date = parseDateInput(rawDate);
  if (!date) return err('VALIDATION_ERROR', 'Data inválida.');
  let time: string | null = null;
  if (!allDay && rawTime) {
    time = parseTimeInput(rawTime);
    if (!time) return err('VALIDATION_ERROR', 'Hora inválida.');
  }

  if (hasConflict(db, actor, { ...current, date, time }, id)) {
    return err('SCHEDULE_CONFLICT', CONFLICT_MESSAGE);
  }
  db.prepare('UPDATE appointments SET date = ?, time = ? WHERE id = ? AND company_id = ?').run(
    date,
    time,
    id,
    actor.company.id
  );
  return ok({ ok: true });
}

const isVehicleType = (value: string): value is VehicleType =>
  VEHICLE_TYPES.some((type) => type === value);
const isAppointmentType = (value: string): value is AppointmentType =>
  APPOINTMENT_TYPES.some((type) => type === value);

// Raised inside the quick-create transaction so the client and vehicle roll back
class QuickCreateAborted extends Error {
  constructor(public readonly failure: Err) {
    super(failure.error.message);
    this.name = 'QuickCreateAborted';
  }
}

// QUICK create from the calendar: finds or creates the client and the vehicle
export function quickCreateAppointment(
  db: Db,
  actor: TenantActor,
  input: unknown
): Result<{ ok: true; event: CalendarEvent }> {
  const body = typeof input === 'object' && input !== null ? input : {};
  const field = (name: string) => text(Reflect.get(body, name));

  const name = field('clienteNome').toUpperCase();
  const phone = field('telefone');
  const model = field('modelo');
  const vehicleType = field('veiculoTipo');
  const appointmentType = field('tipo');
  const rawDate = field('data');
  const rawTime = field('hora');

  if (!name || !rawDate || !rawTime) return err('VALIDATION_ERROR', 'Informe nome, data e hora.');
  const date = parseDateInput(rawDate);
  if (!date) return err('VALIDATION_ERROR', 'Data inválida.');
  const time = parseTimeInput(rawTime);
  if (!time) return err('VALIDATION_ERROR', 'Hora inválida.');

  const run = db.transaction((): AppointmentView => {
    const existingClient = db
      .prepare<unknown[], { id: number }>('SELECT id FROM clients WHERE company_id = ? AND name = ?')
      .get(actor.company.id, name);
    const clientId = existingClient
      ? existingClient.id
      : insertClient(db, actor, { name, phone: phone || 'Não informado' }).id;

    const plate = (normalizePlate(field('placa')) || `TEMP-${clientId}`).slice(0, 10);
    let vehicle = findVehicleByPlate(db, actor, plate);
    if (vehicle && vehicle.clientId !== clientId) {
      throw new QuickCreateAborted(
        err('PLATE_OWNED_BY_OTHER_CLIENT', 'Placa já vinculada a outro cliente. Edite o cadastro completo.')
      );
    }
    if (!vehicle) {
      vehicle = insertVehicle(db, actor, {
        clientId,
        type: isVehicleType(vehicleType) ? vehicleType : 'CARRO',
        plate,
        brand: '',
        model: model || 'Sem modelo',
        year: '',
        color: ''
      });
    }

    const created = insertAppointment(db, actor, {
      clientId,
      vehicleId: vehicle.id,
      date,
      time,
      type: isAppointmentType(appointmentType) ? appointmentType : 'NOTA',
      notes: field('observacoes')
    });
    if (!created.ok) throw new QuickCreateAborted(created);
    return created.data;
  });

  try {
    return ok({ ok: true, event: toEvent(run()) });
  } catch (e) {
    if (e instanceof QuickCreateAborted) return e.failure;
    throw e;
  }
}

// DELETE an appointment
export function deleteAppointment(db: Db, actor: TenantActor, id: number): Result<{ ok: true }> {
  const info = db
    .prepare('DELETE FROM appointments WHERE id = ? AND company_id = ?')
    .run(id, actor.company.id);
  if (info.changes === 0) return err('APPOINTMENT_NOT_FOUND', NOT_FOUND_MESSAGE);
  return ok({ ok: true });
}
