import { Db } from '../db/database';
import { ORDER_STATUS_LABELS, ORDER_STATUSES, TenantActor } from '../models/structures';
import { addDaysIso, today } from '../utils/dates';
import { roundMoney } from '../utils/text';
import { Period, resolvePeriod } from './cashService';
import { loadOrders, OrderView } from './serviceOrderService';

export interface PendingBalance {
  client: string;
  phone: string;
  orderId: number;
  balance: number;
}

export interface Report extends Period {
  orders: OrderView[];
  byStatus: { status: string; label: string; count: number }[];
  revenue: number;
  expenses: number;
  openClients: { id: number; name: string; phone: string }[];
  pending: PendingBalance[];
}

function sumBetween(db: Db, sql: string, companyId: number, period: Period): number {
  const row = db.prepare<unknown[], { total: number }>(sql).get(companyId, period.start, period.end);
  return roundMoney(row?.total ?? 0);
}

// REPORT for a period: orders entered, revenue, expenses and open balances
export function getReport(db: Db, actor: TenantActor, query: { inicio?: unknown; fim?: unknown }): Report {
  const day = today();
  const period = resolvePeriod(query, { start: addDaysIso(day, -30), end: day }, { checkResolved: true });

  const orders = loadOrders(db, actor, 'o.entry_date BETWEEN ? AND ?', [period.start, period.end]);
  const byStatus = ORDER_STATUSES.map((status) => ({
    status,
    label: ORDER_STATUS_LABELS[status],
    count: orders.filter((order) => order.status === status).length
  }));

  const open = orders.filter((order) => order.totals.balance > 0);
  const clients = new Map<number, { id: number; name: string; phone: string }>();
  for (const order of open) {
    clients.set(order.clientId, { id: order.clientId, name: order.clientName, phone: order.clientPhone });
  }

  return {
    ...period,
    orders,
    byStatus,
    revenue: sumBetween(
      db,
      'SELECT IFNULL(SUM(amount), 0) AS total FROM payments WHERE company_id = ? AND paid_on BETWEEN ? AND ?',
      actor.company.id,
      period
    ),
    expenses: sumBetween(
      db,
      'SELECT IFNULL(SUM(amount), 0) AS total FROM expenses WHERE company_id = ? AND date BETWEEN ? AND ?',
      actor.company.id,
      period
    ),
    openClients: [...clients.values()].sort((a, b) => a.name.localeCompare(b.name)),
    pending: open.map((order) => ({
      client: order.clientName,
      phone: order.clientPhone,
      orderId: order.id,
      balance: order.totals.balance
    }))
  };
}
