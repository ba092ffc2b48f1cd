import { Db } from '../db/database';
import { createLogger } from '../modules/logger';
import { nowIso, today } from '../utils/dates';
import { insertCompany } from './companyService';
import { findUserRowByUsername, insertUser } from './userService';

const log = createLogger('seed');

export const DEMO_USERNAME = 'admin';
export const DEMO_PASSWORD = 'admin123';

export interface SeedSummary {
  companyId: number;
  userId: number;
  orderId: number;
}

// Returns the id of the first matching row, or inserts one
function getOrCreate(db: Db, select: string, params: unknown[], insert: () => number): number {
  const row = db.prepare<unknown[], { id: number }>(select).get(...params);
  return row ? row.id : insert();
}

const insertId = (db: Db, sql: string, params: Record<string, unknown>): number =>
  Number(db.prepare(sql).run(params).lastInsertRowid);

/** Demo tenant with one client, vehicle, order, item and payment. Running it twice adds nothing. */
export function seedDemo(db: Db): SeedSummary {
  const run = db.transaction((): SeedSummary => {
    const createdAt = nowIso();
    const day = today();

    const companyId = getOrCreate(db, 'SELECT id FROM companies WHERE name = ?', ['Oficina Demo'], () =>
      insertCompany(db, {
        name: 'Oficina Demo',
        cnpjCpf: '',
        phone: '11999999999',
        cep: '',
        street: '',
        number: '',
        district: '',
        city: '',
        logo: null,
        plan: 'BASICO',
        planPeriod: '30d',
        planUpdatedAt: null,
        planExpiresAt: null,
        isActive: true,
        paymentConfirmed: true,
        renewalPeriod: '',
        renewalRequestedAt: null
      }).id
    );

    const existing = findUserRowByUsername(db, DEMO_USERNAME);
    const userId = existing
      ? existing.id
      : insertUser(db, {
          companyId,
          username: DEMO_USERNAME,
          email: 'admin@demo.com',
          password: DEMO_PASSWORD,
          isManager: true,
          isSuperuser: true
        }).id;

    const clientId = getOrCreate(
      db,
      'SELECT id FROM clients WHERE company_id = ? AND name = ? AND phone = ?',
      [companyId, 'CLIENTE DEMO', '11988887777'],
      () =>
        insertId(
          db,
          `INSERT INTO clients (company_id, name, phone, email, created_at)
           VALUES (@companyId, 'CLIENTE DEMO', '11988887777', 'cliente@demo.com', @createdAt)`,
          { companyId, createdAt }
        )
    );

    const vehicleId = getOrCreate(
      db,
      'SELECT id FROM vehicles WHERE company_id = ? AND plate = ?',
      [companyId, 'ABC1D23'],
      () =>
        insertId(
          db,
          `INSERT INTO vehicles (company_id, client_id, type, plate, brand, model, year, created_at)
           VALUES (@companyId, @clientId, 'CARRO', 'ABC1D23', 'Fiat', 'Uno', '2010', @createdAt)`,
          { companyId, clientId, createdAt }
        )
    );

    const problem = 'Troca de óleo e revisão.';
    const orderId = getOrCreate(
      db,
      'SELECT id FROM service_orders WHERE company_id = ? AND vehicle_id = ? AND problem = ?',
      [companyId, vehicleId, problem],
      () =>
        insertId(
          db,
          `INSERT INTO service_orders (company_id, client_id, vehicle_id, responsible_id, created_by_id,
             status, entry_date, problem, labor, discount, created_at)
           VALUES (@companyId, @clientId, @vehicleId, @userId, @userId,
             'ABERTA', @day, @problem, 150, 0, @createdAt)`,
          { companyId, clientId, vehicleId, userId, day, problem, createdAt }
        )
    );

    getOrCreate(
      db,
      'SELECT id FROM service_order_items WHERE order_id = ? AND description = ?',
      [orderId, 'Óleo 5W30'],
      () =>
        insertId(
          db,
          `INSERT INTO service_order_items (company_id, order_id, description, qty, unit_price, subtotal)
           VALUES (@companyId, @orderId, 'Óleo 5W30', 1, 90, 90)`,
          { companyId, orderId }
        )
    );

    getOrCreate(
      db,
      'SELECT id FROM payments WHERE order_id = ? AND amount = 100 AND method = ?',
      [orderId, 'Dinheiro'],
      () =>
        insertId(
          db,
          `INSERT INTO payments (company_id, order_id, method, amount, paid_on)
           VALUES (@companyId, @orderId, 'Dinheiro', 100, @day)`,
          { companyId, orderId, day }
        )
    );

    return { companyId, userId, orderId };
  });

  const summary = run();
  log.info('demo data ready', { ...summary, username: DEMO_USERNAME });
  return summary;
}
