import { format, parseISO, startOfMonth, startOfYear } from 'date-fns';
import { Db } from '../db/database';
import { ExpenseSchema } from '../models/schemas';
import { Expense, Payment, PaymentMethod, Result, TenantActor } from '../models/structures';
import { addDaysIso, dayMonthLabel, monthLabel, parseDateInput, today } from '../utils/dates';
import { roundMoney } from '../utils/text';
import { toPayment } from './serviceOrderService';
import { err, ok, validate } from './common';

export const RANGE_WARNING = 'Data de início não pode ser maior que a data final.';

interface ExpenseRow {
  id: number;
  company_id: number;
  description: string;
  amount: number;
  date: string;
}

const toExpense = (row: ExpenseRow): Expense => ({
  id: row.id,
  companyId: row.company_id,
  description: row.description,
  amount: row.amount,
  date: row.date
});

export interface Period {
  start: string;
  end: string;
  warnings: string[];
}

/**
 * Reads `inicio`/`fim`; missing or unreadable ends take the defaults and an
 * inverted explicit range falls back to the defaults with a warning.
 * With `checkResolved`, a single end that inverts the range resets it too.
 */
export function resolvePeriod(
  query: { inicio?: unknown; fim?: unknown },
  defaults: { start: string; end: string },
  { checkResolved = false }: { checkResolved?: boolean } = {}
): Period {
  const start = parseDateInput(query.inicio);
  const end = parseDateInput(query.fim);
  const period = { start: start ?? defaults.start, end: end ?? defaults.end };
  const checked = checkResolved || Boolean(query.inicio && query.fim);
  if (checked && period.start > period.end) {
    return { ...defaults, warnings: [RANGE_WARNING] };
  }
  return { ...period, warnings: [] };
}

const sumOf = (values: number[]) => roundMoney(values.reduce((acc, value) => acc + value, 0));

export interface CashRegister extends Period {
  income: (Payment & { orderId: number; clientName: string })[];
  outflow: Expense[];
  incomeTotal: number;
  outflowTotal: number;
  balance: number;
}

// CASH register: payments in, expenses out, for one period
export function getCashRegister(
  db: Db,
  actor: TenantActor,
  query: { inicio?: unknown; fim?: unknown }
): CashRegister {
  const day = today();
  const period = resolvePeriod(query, { start: `${day.slice(0, 8)}01`, end: day });

  const income = db
    .prepare<
      unknown[],
      { id: number; company_id: number; order_id: number; method: PaymentMethod; amount: number; paid_on: string; client_name: string }
    >(
      `SELECT p.*, c.name AS client_name FROM payments p
       JOIN service_orders o ON o.id = p.order_id
       JOIN clients c ON c.id = o.client_id
       WHERE p.company_id = ? AND p.paid_on BETWEEN ? AND ?
       ORDER BY p.paid_on, p.id`
    )
    .all(actor.company.id, period.start, period.end)
    .map((row) => ({ ...toPayment(row), clientName: row.client_name }));
  const outflow = db
    .prepare<unknown[], ExpenseRow>(
      'SELECT * FROM expenses WHERE company_id = ? AND date BETWEEN ? AND ? ORDER BY date, id'
    )
    .all(actor.company.id, period.start, period.end)
    .map(toExpense);

  const incomeTotal = sumOf(income.map((payment) => payment.amount));
  const outflowTotal = sumOf(outflow.map((expense) => expense.amount));
  return {
    ...period,
    income,
    outflow,
    incomeTotal,
    outflowTotal,
    balance: roundMoney(incomeTotal - outflowTotal)
  };
}

// CREATE an expense
export function createExpense(db: Db, actor: TenantActor, input: unknown): Result<Expense> {
  const parsed = validate(ExpenseSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const date = data.date ? parseDateInput(data.date) : today();
  if (!date) return err('VALIDATION_ERROR', 'Data inválida.');

  const info = db
    .prepare('INSERT INTO expenses (company_id, description, amount, date) VALUES (?, ?, ?, ?)')
    .run(actor.company.id, data.description, roundMoney(data.amount), date);
  const row = db
    .prepare<unknown[], ExpenseRow>('SELECT * FROM expenses WHERE id = ?')
    .get(Number(info.lastInsertRowid));
  return row ? ok(toExpense(row)) : err('INTERNAL_ERROR', 'Despesa não registrada.');
}

export interface ChartPoint {
  label: string;
  iso: string;
  income: number;
  outflow: number;
  balance: number;
  incomePct: number;
  outflowPct: number;
}

type Bucket = 'day' | 'month' | 'year';

// SQL expression turning a YYYY-MM-DD column into the bucket's first day
const BUCKET_SQL: Record<Bucket, (column: string) => string> = {
  day: (column) => column,
  month: (column) => `substr(${column}, 1, 7) || '-01'`,
  year: (column) => `substr(${column}, 1, 4) || '-01-01'`
};

const BUCKET_LABEL: Record<Bucket, (iso: string) => string> = {
  day: dayMonthLabel,
  month: monthLabel,
  year: (iso) => iso.slice(0, 4)
};

function totalsBy(
  db: Db,
  actor: TenantActor,
  table: 'payments' | 'expenses',
  bucket: Bucket,
  from: string
): Map<string, number> {
  const column = table === 'payments' ? 'paid_on' : 'date';
  const period = BUCKET_SQL[bucket](column);
  const rows = db
    .prepare<unknown[], { period: string; total: number }>(
      `SELECT ${period} AS period, SUM(amount) AS total FROM ${table}
       WHERE company_id = ? AND ${column} >= ?
       GROUP BY period ORDER BY period`
    )
    .all(actor.company.id, from);
  return new Map(rows.map((row) => [row.period, row.total]));
}

/** Merges income and outflow per bucket; percentages are against the largest value (at least 1). */
export function mergeSeries(
  income: Map<string, number>,
  outflow: Map<string, number>,
  label: (iso: string) => string
): ChartPoint[] {
  const keys = [...new Set([...income.keys(), ...outflow.keys()])].sort();
  const max = Math.max(1, ...income.values(), ...outflow.values());
  return keys.map((iso) => {
    const inValue = roundMoney(income.get(iso) ?? 0);
    const outValue = roundMoney(outflow.get(iso) ?? 0);
    return {
      label: label(iso),
      iso,
      income: inValue,
      outflow: outValue,
      balance: roundMoney(inValue - outValue),
      incomePct: roundMoney((inValue / max) * 100),
      outflowPct: roundMoney((outValue / max) * 100)
    };
  });
}

function series(db: Db, actor: TenantActor, bucket: Bucket, from: string): ChartPoint[] {
  return mergeSeries(
    totalsBy(db, actor, 'payments', bucket, from),
    totalsBy(db, actor, 'expenses', bucket, from),
    BUCKET_LABEL[bucket]
  );
}

export interface CashCharts {
  byDay: ChartPoint[];
  byMonth: ChartPoint[];
  byYear: ChartPoint[];
  byMethod: { method: string; total: number }[];
}

// CHARTS of the cash flow by day, month and year
export function getCashCharts(db: Db, actor: TenantActor): CashCharts {
  const day = today();
  const monthStart = format(startOfMonth(parseISO(day)), 'yyyy-MM-dd');
  const yearStart = format(startOfYear(parseISO(day)), 'yyyy-MM-dd');

  const byMethod = db
    .prepare<unknown[], { method: string; total: number }>(
      `SELECT method, SUM(amount) AS total FROM payments WHERE company_id = ?
       GROUP BY method ORDER BY method`
    )
    .all(actor.company.id)
    .map((row) => ({ method: row.method || 'Não informado', total: roundMoney(row.total) }));

  return {
    byDay: series(db, actor, 'day', addDaysIso(day, -29)),
    byMonth: series(db, actor, 'month', addDaysIso(monthStart, -150)),
    byYear: series(db, actor, 'year', addDaysIso(yearStart, -730)),
    byMethod
  };
}
