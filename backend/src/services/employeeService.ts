import { Db } from '../db/database';
import { EmployeeData, EmployeeSchema } from '../models/schemas';
import { Employee, Page, Result, TenantActor } from '../models/structures';
import { nowIso, parseDateInput, today } from '../utils/dates';
import { likePattern } from '../utils/text';
import { bit, err, flag, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

interface EmployeeRow {
  id: number;
  company_id: number;
  name: string;
  phone: string;
  email: string;
  joined_on: string;
  active: number;
  created_at: string;
}

const toEmployee = (row: EmployeeRow): Employee => ({
  id: row.id,
  companyId: row.company_id,
  name: row.name,
  phone: row.phone,
  email: row.email,
  joinedOn: row.joined_on,
  active: flag(row.active),
  createdAt: row.created_at
});

export function findEmployee(db: Db, actor: TenantActor, id: number): Employee | null {
  const row = db
    .prepare<unknown[], EmployeeRow>('SELECT * FROM employees WHERE id = ? AND company_id = ?')
    .get(id, actor.company.id);
  return row ? toEmployee(row) : null;
}

function parseEmployee(input: unknown): Result<EmployeeData & { joinedOn: string }> {
  const parsed = validate(EmployeeSchema, input);
  if (!parsed.ok) return parsed;
  if (!parsed.data.joinedOn) return ok({ ...parsed.data, joinedOn: today() });

  const joinedOn = parseDateInput(parsed.data.joinedOn);
  if (!joinedOn) return err('VALIDATION_ERROR', 'Data de ingresso inválida.');
  return ok({ ...parsed.data, joinedOn });
}

// LIST employees (name, email or phone search)
export function listEmployees(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; page?: unknown }
): Page<Employee> {
  const page = pageNumber(query.page);
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE company_id = ? AND (name LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\' OR phone LIKE ? ESCAPE '\\')`
    : 'WHERE company_id = ?';
  const params: unknown[] = pattern
    ? [actor.company.id, pattern, pattern, pattern]
    : [actor.company.id];

  const total = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM employees ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], EmployeeRow>(
      `SELECT * FROM employees ${where} ORDER BY name COLLATE NOCASE LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));
  return toPage(rows.map(toEmployee), total?.n ?? 0, page);
}

// CREATE an employee
export function createEmployee(db: Db, actor: TenantActor, input: unknown): Result<Employee> {
  const parsed = parseEmployee(input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const info = db
    .prepare(
      `INSERT INTO employees (company_id, name, phone, email, joined_on, active, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    )
    .run(actor.company.id, data.name, data.phone, data.email, data.joinedOn, bit(data.active), nowIso());
  const employee = findEmployee(db, actor, Number(info.lastInsertRowid));
  return employee ? ok(employee) : err('EMPLOYEE_NOT_FOUND', 'Funcionário não encontrado.');
}

// UPDATE an employee
export function updateEmployee(db: Db, actor: TenantActor, id: number, input: unknown): Result<Employee> {
  if (!findEmployee(db, actor, id)) return err('EMPLOYEE_NOT_FOUND', 'Funcionário não encontrado.');
  const parsed = parseEmployee(input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  db.prepare(
    `UPDATE employees SET name = ?, phone = ?, email = ?, joined_on = ?, active = ?
     WHERE id = ? AND company_id = ?`
  ).run(data.name, data.phone, data.email, data.joinedOn, bit(data.active), id, actor.company.id);
  const employee = findEmployee(db, actor, id);
  return employee ? ok(employee) : err('EMPLOYEE_NOT_FOUND', 'Funcionário não encontrado.');
}
