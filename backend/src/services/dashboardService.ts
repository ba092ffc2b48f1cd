import { format, parseISO, startOfMonth, subMonths } from 'date-fns';
import { Db } from '../db/database';
import { ORDER_STATUS_LABELS, OrderStatus, TenantActor } from '../models/structures';
import { addDaysIso, dateOf, dayMonthLabel, monthLabel, parseDateInput, today } from '../utils/dates';
import { roundMoney } from '../utils/text';
import { criticalStock } from './productService';
import { orderScope } from './serviceOrderService';

export interface DashboardQuery {
  range?: unknown;
  start?: unknown;
  end?: unknown;
  clientesTop?: unknown;
  recorrenciaTop?: unknown;
  produtosTop?: unknown;
}

interface DateRange {
  start: string;
  end: string;
}

const RANGE_KEY = /^(\d+)([dmy])$/;

const monthsBack = (day: string, months: number): string =>
  format(subMonths(startOfMonth(parseISO(day)), Math.max(months - 1, 0)), 'yyyy-MM-dd');

/**
 * "30d" -> last 30 days; "6m" -> from the first of the month 5 months ago;
 * "1y" -> same with 12 months. Unknown keys fall back to the defaults.
 */
export function resolveRange(
  rangeKey: unknown,
  fallback: { days: number } | { months: number }
): DateRange {
  const day = today();
  const match = RANGE_KEY.exec(typeof rangeKey === 'string' ? rangeKey.trim().toLowerCase() : '');
  if (match) {
    const amount = Number(match[1]);
    if (match[2] === 'd') return { start: addDaysIso(day, -(Math.max(amount, 1) - 1)), end: day };
    if (match[2] === 'm') return { start: monthsBack(day, amount), end: day };
    return { start: monthsBack(day, amount * 12), end: day };
  }
  if ('days' in fallback) return { start: addDaysIso(day, -(fallback.days - 1)), end: day };
  return { start: monthsBack(day, fallback.months), end: day };
}

export function parseLimit(value: unknown, fallback = 10): number {
  const parsed = Number.parseInt(String(value ?? ''), 10);
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return Math.min(parsed, 50);
}

export function resolveDashboardPeriods(query: DashboardQuery): { period: DateRange; operational: DateRange } {
  let start = parseDateInput(query.start);
  let end = parseDateInput(query.end);
  if (start && end) {
    if (start > end) [start, end] = [end, start];
    return { period: { start, end }, operational: { start, end } };
  }
  const period = resolveRange(query.range, { months: 6 });
  const isDays = typeof query.range === 'string' && query.range.trim().toLowerCase().endsWith('d');
  const operational = resolveRange(isDays ? query.range : undefined, { days: 30 });
  return { period, operational };
}

// Visibility of payments: staff see those of orders they own or created
function paymentScope(actor: TenantActor): { sql: string; params: unknown[] } {
  if (actor.isManager) return { sql: 'p.company_id = ?', params: [actor.company.id] };
  return {
    sql: 'p.company_id = ? AND (o.responsible_id = ? OR o.created_by_id = ?)',
    params: [actor.company.id, actor.user.id, actor.user.id]
  };
}

const PAYMENTS_FROM = 'FROM payments p JOIN service_orders o ON o.id = p.order_id';

export interface DashboardData {
  periodo: { start: string; end: string; operacionalStart: string; operacionalEnd: string };
  financeiro: {
    lucroMensal: { labels: string[]; entradas: number[]; despesas: number[]; lucro: number[] };
    saldoPeriodo: number;
    saldoGeral: number;
  };
  operacional: {
    osPorFuncionario: { labels: string[]; valores: number[] };
    statusOs: { labels: string[]; valores: number[] };
    tempoMedio: { labels: string[]; dias: number[] };
  };
  produtos: {
    maisVendidos: { labels: string[]; qtd: number[]; total: number[] };
    estoqueCritico: {
      total: number;
      itens: { nome: string; estoqueAtual: number | null; estoqueMinimo: number }[];
    };
  };
  clientes: {
    maisLucrativos: { labels: string[]; valores: number[] };
    recorrencia: { labels: string[]; clientes: number[]; recorrentes: number[] };
  };
}

function financeiro(db: Db, actor: TenantActor, period: DateRange): DashboardData['financeiro'] {
  const payments = paymentScope(actor);
  const monthOf = (column: string) => `substr(${column}, 1, 7) || '-01'`;

  const income = db
    .prepare<unknown[], { period: string; total: number }>(
      `SELECT ${monthOf('p.paid_on')} AS period, SUM(p.amount) AS total ${PAYMENTS_FROM}
       WHERE ${payments.sql} AND p.paid_on BETWEEN ? AND ? GROUP BY period`
    )
    .all(...payments.params, period.start, period.end);
  const outflow = db
    .prepare<unknown[], { period: string; total: number }>(
      `SELECT ${monthOf('date')} AS period, SUM(amount) AS total FROM expenses
       WHERE company_id = ? AND date BETWEEN ? AND ? GROUP BY period`
    )
    .all(actor.company.id, period.start, period.end);

  const months = new Map<string, { entradas: number; despesas: number }>();
  for (const row of income) months.set(row.period, { entradas: row.total, despesas: 0 });
  for (const row of outflow) {
    months.set(row.period, { entradas: months.get(row.period)?.entradas ?? 0, despesas: row.total });
  }
  const keys = [...months.keys()].sort();
  const values = keys.map((key) => months.get(key) ?? { entradas: 0, despesas: 0 });

  const total = (sql: string, params: unknown[]) =>
    db.prepare<unknown[], { total: number }>(sql).get(...params)?.total ?? 0;
  const periodIncome = income.reduce((acc, row) => acc + row.total, 0);
  const periodOutflow = outflow.reduce((acc, row) => acc + row.total, 0);
  const allIncome = total(
    `SELECT IFNULL(SUM(p.amount), 0) AS total ${PAYMENTS_FROM} WHERE ${payments.sql}`,
    payments.params
  );
  const allOutflow = total(
    'SELECT IFNULL(SUM(amount), 0) AS total FROM expenses WHERE company_id = ?',
    [actor.company.id]
  );

  return {
    lucroMensal: {
      labels: keys.map(monthLabel),
      entradas: values.map((value) => roundMoney(value.entradas)),
      despesas: values.map((value) => roundMoney(value.despesas)),
      lucro: values.map((value) => roundMoney(value.entradas - value.despesas))
    },
    saldoPeriodo: roundMoney(periodIncome - periodOutflow),
    saldoGeral: roundMoney(allIncome - allOutflow)
  };
}

function operacional(
  db: Db,
  actor: TenantActor,
  period: DateRange,
  operational: DateRange
): DashboardData['operacional'] {
  const scope = orderScope(actor);

  const byWorker = db
    .prepare<unknown[], { label: string | null; total: number }>(
      `SELECT COALESCE(e.name, u.username) AS label, COUNT(*) AS total
       FROM service_orders o
       LEFT JOIN employees e ON e.id = o.executor_id
       LEFT JOIN users u ON u.id = o.responsible_id
       WHERE ${scope.sql} AND o.entry_date BETWEEN ? AND ?
       GROUP BY label ORDER BY total DESC, label`
    )
    .all(...scope.params, period.start, period.end);

  const byStatus = db
    .prepare<unknown[], { status: OrderStatus; total: number }>(
      `SELECT o.status, COUNT(*) AS total FROM service_orders o
       WHERE ${scope.sql} AND o.entry_date BETWEEN ? AND ?
       GROUP BY o.status ORDER BY o.status`
    )
    .all(...scope.params, period.start, period.end);

  // Finish day is taken in the business calendar, so filter in code
  const finished = db
    .prepare<unknown[], { entry_date: string; finished_at: string }>(
      `SELECT o.entry_date, o.finished_at FROM service_orders o
       WHERE ${scope.sql} AND o.status = 'FINALIZADA' AND o.finished_at IS NOT NULL`
    )
    .all(...scope.params);
  const durations = new Map<string, number[]>();
  for (const row of finished) {
    const day = dateOf(row.finished_at);
    if (day < operational.start || day > operational.end) continue;
    const days = (Date.parse(row.finished_at) - Date.parse(`${row.entry_date}T00:00:00Z`)) / 86_400_000;
    durations.set(day, [...(durations.get(day) ?? []), days]);
  }
  const days = [...durations.keys()].sort();

  return {
    osPorFuncionario: {
      labels: byWorker.map((row) => row.label || 'Sem executor'),
      valores: byWorker.map((row) => row.total)
    },
    statusOs: {
      labels: byStatus.map((row) => ORDER_STATUS_LABELS[row.status] ?? row.status),
      valores: byStatus.map((row) => row.total)
    },
    tempoMedio: {
      labels: days.map(dayMonthLabel),
      dias: days.map((day) => {
        const values = durations.get(day) ?? [];
        return roundMoney(values.reduce((acc, value) => acc + value, 0) / Math.max(values.length, 1));
      })
    }
  };
}

function produtos(
  db: Db,
  actor: TenantActor,
  period: DateRange,
  limit: number
): DashboardData['produtos'] {
  const scope = orderScope(actor);
  const top = db
    .prepare<unknown[], { label: string | null; qty: number; total: number }>(
      `SELECT COALESCE(pr.name, NULLIF(i.description, '')) AS label,
         SUM(i.qty) AS qty, SUM(i.subtotal) AS total
       FROM service_order_items i
       JOIN service_orders o ON o.id = i.order_id
       LEFT JOIN products pr ON pr.id = i.product_id
       WHERE ${scope.sql} AND o.entry_date BETWEEN ? AND ?
       GROUP BY label ORDER BY total DESC, label LIMIT ?`
    )
    .all(...scope.params, period.start, period.end, limit);

  const critical = criticalStock(db, actor, 10);
  return {
    maisVendidos: {
      labels: top.map((row) => row.label || 'Produto'),
      qtd: top.map((row) => roundMoney(row.qty)),
      total: top.map((row) => roundMoney(row.total))
    },
    estoqueCritico: {
      total: critical.total,
      itens: critical.items.map((product) => ({
        nome: product.name,
        estoqueAtual: product.stock,
        estoqueMinimo: product.minStock
      }))
    }
  };
}

function clientes(
  db: Db,
  actor: TenantActor,
  period: DateRange,
  limits: { clients: number; months: number }
): DashboardData['clientes'] {
  const payments = paymentScope(actor);
  const top = db
    .prepare<unknown[], { name: string; total: number }>(
      `SELECT c.name, SUM(p.amount) AS total ${PAYMENTS_FROM}
       JOIN clients c ON c.id = o.client_id
       WHERE ${payments.sql} AND p.paid_on BETWEEN ? AND ?
       GROUP BY c.id ORDER BY total DESC, c.name LIMIT ?`
    )
    .all(...payments.params, period.start, period.end, limits.clients);

  const scope = orderScope(actor);
  const perClient = db
    .prepare<unknown[], { period: string; orders: number }>(
      `SELECT substr(o.entry_date, 1, 7) || '-01' AS period, COUNT(*) AS orders
       FROM service_orders o
       WHERE ${scope.sql} AND o.entry_date BETWEEN ? AND ?
       GROUP BY period, o.client_id ORDER BY period`
    )
    .all(...scope.params, period.start, period.end);
  const months = new Map<string, { clientes: number; recorrentes: number }>();
  for (const row of perClient) {
    const month = months.get(row.period) ?? { clientes: 0, recorrentes: 0 };
    month.clientes += 1;
    if (row.orders > 1) month.recorrentes += 1;
    months.set(row.period, month);
  }
  const keys = [...months.keys()].sort().slice(-limits.months);

  return {
    maisLucrativos: {
      labels: top.map((row) => row.name),
      valores: top.map((row) => roundMoney(row.total))
    },
    recorrencia: {
      labels: keys.map(monthLabel),
      clientes: keys.map((key) => months.get(key)?.clientes ?? 0),
      recorrentes: keys.map((key) => months.get(key)?.recorrentes ?? 0)
    }
  };
}

// DASHBOARD charts data; staff only see their own orders and payments
export function buildDashboardData(db: Db, actor: TenantActor, query: DashboardQuery): DashboardData {
  const { period, operational } = resolveDashboardPeriods(query);
  return {
    periodo: {
      start: period.start,
      end: period.end,
      operacionalStart: operational.start,
      operacionalEnd: operational.end
    },
    financeiro: financeiro(db, actor, period),
    operacional: operacional(db, actor, period, operational),
    produtos: produtos(db, actor, period, parseLimit(query.produtosTop)),
    clientes: clientes(db, actor, period, {
      clients: parseLimit(query.clientesTop),
      months: parseLimit(query.recorrenciaTop)
    })
  };
}

export interface DashboardSummary {
  openCount: number;
  waitingCount: number;
  executionCount: number;
  finishedRecentCount: number;
  paymentsRecentTotal: number;
  range: string;
  data: DashboardData;
}

// SUMMARY cards for the manager home, plus the charts
export function getDashboardSummary(db: Db, actor: TenantActor, query: DashboardQuery): DashboardSummary {
  const scope = orderScope(actor);
  const since = addDaysIso(today(), -30);
  const count = (where: string, params: unknown[] = []) =>
    db
      .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM service_orders o WHERE ${scope.sql} AND ${where}`)
      .get(...scope.params, ...params)?.n ?? 0;

  const payments = db
    .prepare<unknown[], { total: number }>(
      'SELECT IFNULL(SUM(amount), 0) AS total FROM payments WHERE company_id = ? AND paid_on >= ?'
    )
    .get(actor.company.id, since);

  return {
    openCount: count("o.status = 'ABERTA'"),
    waitingCount: count("o.status = 'AGUARDANDO_PECA'"),
    executionCount: count("o.status = 'EXECUCAO'"),
    finishedRecentCount: count("o.status = 'FINALIZADA' AND o.entry_date >= ?", [since]),
    paymentsRecentTotal: roundMoney(payments?.total ?? 0),
    range: typeof query.range === 'string' && query.range ? query.range : '6m',
    data: buildDashboardData(db, actor, query)
  };
}
