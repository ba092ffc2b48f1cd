import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';

export type Db = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS companies (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    cnpj_cpf TEXT NOT NULL DEFAULT '',
    phone TEXT NOT NULL DEFAULT '',
    cep TEXT NOT NULL DEFAULT '',
    street TEXT NOT NULL DEFAULT '',
    number TEXT NOT NULL DEFAULT '',
    district TEXT NOT NULL DEFAULT '',
    city TEXT NOT NULL DEFAULT '',
    logo TEXT,
    plan TEXT NOT NULL DEFAULT 'BASICO',          -- BASICO, PLUS
    plan_period TEXT NOT NULL DEFAULT '30d',      -- 30d, 6m, 12m
    plan_updated_at TEXT,
    plan_expires_at TEXT,
    is_active INTEGER NOT NULL DEFAULT 1,
    payment_confirmed INTEGER NOT NULL DEFAULT 0,
    renewal_period TEXT NOT NULL DEFAULT '',
    renewal_requested_at TEXT,
    temporary_password TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS plan_prices (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    plan TEXT NOT NULL,
    period TEXT NOT NULL,
    amount REAL NOT NULL CHECK (amount >= 0),
    pix_copy_paste TEXT NOT NULL DEFAULT '',
    updated_at TEXT NOT NULL,
    UNIQUE (plan, period)
  );

  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER REFERENCES companies(id) ON DELETE RESTRICT,
    username TEXT NOT NULL UNIQUE COLLATE NOCASE,
    email TEXT NOT NULL DEFAULT '',
    password_hash TEXT NOT NULL DEFAULT '',
    first_name TEXT NOT NULL DEFAULT '',
    last_name TEXT NOT NULL DEFAULT '',
    recovery_email TEXT NOT NULL DEFAULT '',
    recovery_phone TEXT NOT NULL DEFAULT '',
    is_manager INTEGER NOT NULL DEFAULT 0,
    is_superuser INTEGER NOT NULL DEFAULT 0,
    is_active INTEGER NOT NULL DEFAULT 1,
    date_joined TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS employees (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    phone TEXT NOT NULL DEFAULT '',
    email TEXT NOT NULL DEFAULT '',
    joined_on TEXT NOT NULL,
    active INTEGER NOT NULL DEFAULT 1,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS clients (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    phone TEXT NOT NULL,
    email TEXT NOT NULL DEFAULT '',
    document TEXT NOT NULL DEFAULT '',
    cep TEXT NOT NULL DEFAULT '',
    street TEXT NOT NULL DEFAULT '',
    number TEXT NOT NULL DEFAULT '',
    district TEXT NOT NULL DEFAULT '',
    city TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS vehicles (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    client_id INTEGER NOT NULL REFERENCES clients(id) ON DELETE CASCADE,
    type TEXT NOT NULL,                           -- MOTO, CARRO, CAMINHAO
    plate TEXT NOT NULL,
    brand TEXT NOT NULL DEFAULT '',
    model TEXT NOT NULL DEFAULT '',
    year TEXT NOT NULL DEFAULT '',
    color TEXT NOT NULL DEFAULT '',
    km INTEGER CHECK (km IS NULL OR km >= 0),
    created_at TEXT NOT NULL,
    UNIQUE (company_id, plate)
  );

  CREATE TABLE IF NOT EXISTS appointments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    client_id INTEGER NOT NULL REFERENCES clients(id) ON DELETE CASCADE,
    vehicle_id INTEGER NOT NULL REFERENCES vehicles(id) ON DELETE CASCADE,
    date TEXT NOT NULL,
    time TEXT,
    type TEXT NOT NULL DEFAULT 'NOTA',            -- ENTREGA, RETIRADA, NOTA
    notes TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );
  -- NULL never equals NULL in a UNIQUE constraint, so all-day slots are keyed on ''
  CREATE UNIQUE INDEX IF NOT EXISTS appointments_slot
    ON appointments (company_id, client_id, vehicle_id, date, IFNULL(time, ''));

  CREATE TABLE IF NOT EXISTS products (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    name TEXT NOT NULL,
    code TEXT NOT NULL DEFAULT '',
    description TEXT NOT NULL DEFAULT '',
    cost REAL CHECK (cost IS NULL OR cost >= 0),
    price REAL NOT NULL CHECK (price >= 0),
    stock INTEGER CHECK (stock IS NULL OR stock >= 0),
    min_stock INTEGER NOT NULL DEFAULT 0 CHECK (min_stock >= 0),
    UNIQUE (company_id, name)
  );

  CREATE TABLE IF NOT EXISTS service_orders (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    client_id INTEGER NOT NULL REFERENCES clients(id) ON DELETE CASCADE,
    vehicle_id INTEGER NOT NULL REFERENCES vehicles(id) ON DELETE CASCADE,
    responsible_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    executor_id INTEGER REFERENCES employees(id) ON DELETE SET NULL,
    created_by_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    finished_by_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    status TEXT NOT NULL DEFAULT 'ABERTA',
    entry_date TEXT NOT NULL,
    expected_delivery TEXT,
    started_at TEXT,
    finished_at TEXT,
    problem TEXT NOT NULL,
    diagnosis TEXT NOT NULL DEFAULT '',
    labor REAL NOT NULL DEFAULT 0 CHECK (labor >= 0),
    discount REAL NOT NULL DEFAULT 0 CHECK (discount >= 0),
    notes TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS service_order_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    order_id INTEGER NOT NULL REFERENCES service_orders(id) ON DELETE CASCADE,
    user_id INTEGER REFERENCES users(id) ON DELETE SET NULL,
    action TEXT NOT NULL,
    note TEXT NOT NULL DEFAULT '',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS service_order_items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    order_id INTEGER NOT NULL REFERENCES service_orders(id) ON DELETE CASCADE,
    product_id INTEGER REFERENCES products(id) ON DELETE SET NULL,
    description TEXT NOT NULL,
    qty REAL NOT NULL CHECK (qty >= 0),
    unit_price REAL NOT NULL CHECK (unit_price >= 0),
    subtotal REAL NOT NULL
  );

  CREATE TABLE IF NOT EXISTS payments (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    order_id INTEGER NOT NULL REFERENCES service_orders(id) ON DELETE CASCADE,
    method TEXT NOT NULL,
    amount REAL NOT NULL CHECK (amount >= 0),
    paid_on TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS expenses (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    company_id INTEGER NOT NULL REFERENCES companies(id) ON DELETE CASCADE,
    description TEXT NOT NULL,
    amount REAL NOT NULL CHECK (amount >= 0),
    date TEXT NOT NULL
  );
`;

/** "sqlite:./x.db" | "file:./x.db" | "./x.db" | ":memory:" -> path for better-sqlite3 */
export function resolveDatabasePath(url: string): string {
  const trimmed = url.trim();
  if (trimmed === ':memory:' || trimmed === 'sqlite::memory:') return ':memory:';
  const withoutScheme = trimmed.replace(/^(sqlite|file):(\/\/)?/, '');
  return withoutScheme || ':memory:';
}

export function openDatabase(url: string): Db {
  const file = resolveDatabasePath(url);
  if (file !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
  }

  const db = new Database(file);
  db.pragma('foreign_keys = ON');
  if (file !== ':memory:') db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}
