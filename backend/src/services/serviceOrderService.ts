import { Db } from '../db/database';
import {
  OrderItemSchema,
  PaymentSchema,
  ServiceOrderData,
  ServiceOrderSchema
} from '../models/schemas';
import {
  OrderItem,
  OrderLog,
  OrderLogAction,
  OrderStatus,
  OrderTotals,
  ORDER_STATUS_LABELS,
  ORDER_STATUSES,
  Page,
  Payment,
  PaymentMethod,
  Result,
  ServiceOrder,
  TenantActor
} from '../models/structures';
import { nowIso, parseDateInput, today } from '../utils/dates';
import { likePattern, roundMoney } from '../utils/text';
import { findClient } from './clientService';
import { findProduct } from './productService';
import { findVehicle } from './vehicleService';
import { err, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

interface OrderRow {
  id: number;
  company_id: number;
  client_id: number;
  vehicle_id: number;
  responsible_id: number | null;
  executor_id: number | null;
  created_by_id: number | null;
  finished_by_id: number | null;
  status: OrderStatus;
  entry_date: string;
  expected_delivery: string | null;
  started_at: string | null;
  finished_at: string | null;
  problem: string;
  diagnosis: string;
  labor: number;
  discount: number;
  notes: string;
  created_at: string;
}

// Joined columns shown on lists and the detail page
interface OrderViewRow extends OrderRow {
  client_name: string;
  client_phone: string;
  plate: string;
  model: string;
  responsible_name: string | null;
  executor_name: string | null;
  items_total: number;
  paid_total: number;
}

export interface OrderView extends ServiceOrder {
  statusLabel: string;
  clientName: string;
  clientPhone: string;
  plate: string;
  model: string;
  responsibleName: string | null;
  executorName: string | null;
  totals: OrderTotals;
}

export interface OrderDetail {
  order: OrderView;
  items: OrderItem[];
  payments: Payment[];
  logs: (OrderLog & { username: string | null })[];
}

const ORDER_NOT_FOUND = 'Ordem de serviço não encontrada.';

const toOrder = (row: OrderRow): ServiceOrder => ({
  id: row.id,
  companyId: row.company_id,
  clientId: row.client_id,
  vehicleId: row.vehicle_id,
  responsibleId: row.responsible_id,
  executorId: row.executor_id,
  createdById: row.created_by_id,
  finishedById: row.finished_by_id,
  status: row.status,
  entryDate: row.entry_date,
  expectedDelivery: row.expected_delivery,
  startedAt: row.started_at,
  finishedAt: row.finished_at,
  problem: row.problem,
  diagnosis: row.diagnosis,
  labor: row.labor,
  discount: row.discount,
  notes: row.notes,
  createdAt: row.created_at
});

/** total = items + labor - discount; balance = total - payments. Rounded to cents. */
export function computeTotals(
  order: Pick<ServiceOrder, 'labor' | 'discount'>,
  itemsTotal: number,
  paidTotal: number
): OrderTotals {
  const total = roundMoney(itemsTotal + order.labor - order.discount);
  return {
    itemsTotal: roundMoney(itemsTotal),
    total,
    paidTotal: roundMoney(paidTotal),
    balance: roundMoney(total - paidTotal)
  };
}

const toView = (row: OrderViewRow): OrderView => {
  const order = toOrder(row);
  return {
    ...order,
    statusLabel: ORDER_STATUS_LABELS[order.status] ?? order.status,
    clientName: row.client_name,
    clientPhone: row.client_phone,
    plate: row.plate,
    model: row.model,
    responsibleName: row.responsible_name,
    executorName: row.executor_name,
    totals: computeTotals(order, row.items_total, row.paid_total)
  };
};

export const ORDER_VIEW_SELECT = `SELECT o.*, c.name AS client_name, c.phone AS client_phone,
    v.plate, v.model, u.username AS responsible_name, e.name AS executor_name,
    (SELECT IFNULL(SUM(i.subtotal), 0) FROM service_order_items i WHERE i.order_id = o.id) AS items_total,
    (SELECT IFNULL(SUM(p.amount), 0) FROM payments p WHERE p.order_id = o.id) AS paid_total
  FROM service_orders o
  JOIN clients c ON c.id = o.client_id
  JOIN vehicles v ON v.id = o.vehicle_id
  LEFT JOIN users u ON u.id = o.responsible_id
  LEFT JOIN employees e ON e.id = o.executor_id`;

/**
 * WHERE fragment limiting orders to what the actor may see:
 * managers see the whole company, staff only orders they are responsible for.
 */
export function orderScope(actor: TenantActor, alias = 'o'): { sql: string; params: unknown[] } {
  if (actor.isManager) return { sql: `${alias}.company_id = ?`, params: [actor.company.id] };
  return {
    sql: `${alias}.company_id = ? AND ${alias}.responsible_id = ?`,
    params: [actor.company.id, actor.user.id]
  };
}

export function loadOrders(db: Db, actor: TenantActor, extraWhere = '', extraParams: unknown[] = []): OrderView[] {
  const scope = orderScope(actor);
  const where = extraWhere ? `${scope.sql} AND ${extraWhere}` : scope.sql;
  return db
    .prepare<unknown[], OrderViewRow>(`${ORDER_VIEW_SELECT} WHERE ${where} ORDER BY o.entry_date DESC, o.id DESC`)
    .all(...scope.params, ...extraParams)
    .map(toView);
}

export function findOrder(db: Db, actor: TenantActor, id: number): OrderView | null {
  const scope = orderScope(actor);
  const row = db
    .prepare<unknown[], OrderViewRow>(`${ORDER_VIEW_SELECT} WHERE ${scope.sql} AND o.id = ?`)
    .get(...scope.params, id);
  return row ? toView(row) : null;
}

function writeLog(db: Db, actor: TenantActor, orderId: number, action: OrderLogAction, note = ''): void {
  db.prepare(
    `INSERT INTO service_order_logs (company_id, order_id, user_id, action, note, created_at)
     VALUES (?, ?, ?, ?, ?, ?)`
  ).run(actor.company.id, orderId, actor.user.id, action, note, nowIso());
}

type StatusFields = Pick<
  ServiceOrder,
  'status' | 'startedAt' | 'finishedAt' | 'finishedById' | 'expectedDelivery'
>;

/**
 * Stamps start/finish times and delivery date for a status transition and
 * returns the log actions it implies. `previous` is null on create.
 */
export function applyStatusAudit(
  next: StatusFields,
  previous: OrderStatus | null,
  userId: number
): { fields: StatusFields; actions: OrderLogAction[] } {
  const fields = { ...next };
  const actions: OrderLogAction[] = [];
  const changed = previous !== next.status;
  const now = nowIso();

  if (fields.status === 'EXECUCAO' && changed && !fields.startedAt) {
    fields.startedAt = now;
    actions.push('INICIAR');
  }
  if (fields.status === 'FINALIZADA' && changed) {
    fields.finishedAt = now;
    fields.finishedById = userId;
    fields.expectedDelivery = today();
    actions.push('FINALIZAR');
  }
  if (fields.status === 'CANCELADA' && changed) {
    fields.expectedDelivery = today();
    actions.push('CANCELAR');
  }
  if (fields.status !== 'FINALIZADA' && fields.status !== 'CANCELADA') {
    fields.expectedDelivery = null;
  }
  return { fields, actions };
}

interface OrderInput extends Omit<ServiceOrderData, 'entryDate' | 'expectedDelivery'> {
  entryDate: string;
  expectedDelivery: string | null;
}

function activeUserOfCompany(db: Db, actor: TenantActor, userId: number): boolean {
  const row = db
    .prepare<unknown[], { id: number }>(
      'SELECT id FROM users WHERE id = ? AND company_id = ? AND is_active = 1'
    )
    .get(userId, actor.company.id);
  return row !== undefined;
}

function parseOrder(db: Db, actor: TenantActor, input: unknown): Result<OrderInput> {
  const parsed = validate(ServiceOrderSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  if (!findClient(db, actor, data.clientId)) return err('CLIENT_NOT_FOUND', 'Cliente não encontrado.');
  const vehicle = findVehicle(db, actor, data.vehicleId);
  if (!vehicle || vehicle.clientId !== data.clientId) {
    return err('VALIDATION_ERROR', 'Selecione um veículo do cliente escolhido.');
  }

  if (data.executorId !== null) {
    const executor = db
      .prepare<unknown[], { id: number }>(
        'SELECT id FROM employees WHERE id = ? AND company_id = ? AND active = 1'
      )
      .get(data.executorId, actor.company.id);
    if (!executor) return err('VALIDATION_ERROR', 'Selecione um executor válido.');
  }
  if (data.responsibleId !== null && actor.isManager && !activeUserOfCompany(db, actor, data.responsibleId)) {
    return err('VALIDATION_ERROR', 'Selecione um responsável válido.');
  }

  const entryDate = data.entryDate ? parseDateInput(data.entryDate) : today();
  if (!entryDate) return err('VALIDATION_ERROR', 'Data de entrada inválida.');
  let expectedDelivery: string | null = null;
  if (data.expectedDelivery) {
    expectedDelivery = parseDateInput(data.expectedDelivery);
    if (!expectedDelivery) return err('VALIDATION_ERROR', 'Previsão de entrega inválida.');
  }

  return ok({
    ...data,
    // staff always own what they touch
    responsibleId: actor.isManager ? data.responsibleId : actor.user.id,
    entryDate,
    expectedDelivery
  });
}

const ORDER_COLUMNS = `client_id = @clientId, vehicle_id = @vehicleId, responsible_id = @responsibleId,
  executor_id = @executorId, finished_by_id = @finishedById, status = @status,
  entry_date = @entryDate, expected_delivery = @expectedDelivery, started_at = @startedAt,
  finished_at = @finishedAt, problem = @problem, diagnosis = @diagnosis, labor = @labor,
  discount = @discount, notes = @notes`;

// LIST orders: status, entry period and client/plate filters
export function listOrders(
  db: Db,
  actor: TenantActor,
  query: { status?: unknown; inicio?: unknown; fim?: unknown; q?: unknown; page?: unknown }
): Page<OrderView> & { warnings: string[] } {
  const page = pageNumber(query.page);
  const scope = orderScope(actor);
  const clauses = [scope.sql];
  const params = [...scope.params];
  const warnings: string[] = [];

  const status = typeof query.status === 'string' ? query.status : '';
  if (ORDER_STATUSES.some((value) => value === status)) {
    clauses.push('o.status = ?');
    params.push(status);
  }

  let start = parseDateInput(query.inicio);
  let end = parseDateInput(query.fim);
  if (start && end && start > end) {
    warnings.push('Data de início não pode ser maior que a data final.');
    start = null;
    end = null;
  }
  if (start) {
    clauses.push('o.entry_date >= ?');
    params.push(start);
  }
  if (end) {
    clauses.push('o.entry_date <= ?');
    params.push(end);
  }

  const pattern = likePattern(query.q);
  if (pattern) {
    clauses.push(`(c.name LIKE ? ESCAPE '\\' OR v.plate LIKE ? ESCAPE '\\')`);
    params.push(pattern, pattern);
  }

  const where = clauses.join(' AND ');
  const total = db
    .prepare<unknown[], { n: number }>(
      `SELECT COUNT(*) AS n FROM service_orders o
       JOIN clients c ON c.id = o.client_id
       JOIN vehicles v ON v.id = o.vehicle_id
       WHERE ${where}`
    )
    .get(...params);
  const rows = db
    .prepare<unknown[], OrderViewRow>(
      `${ORDER_VIEW_SELECT} WHERE ${where}
       ORDER BY o.entry_date DESC, o.id DESC LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));
  return { ...toPage(rows.map(toView), total?.n ?? 0, page), warnings };
}

// GET an order with items, payments and its audit trail
export function getOrderDetail(db: Db, actor: TenantActor, id: number): Result<OrderDetail> {
  const order = findOrder(db, actor, id);
  if (!order) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);

  const items = db
    .prepare<unknown[], ItemRow>('SELECT * FROM service_order_items WHERE order_id = ? ORDER BY id')
    .all(id)
    .map(toItem);
  const payments = db
    .prepare<unknown[], PaymentRow>('SELECT * FROM payments WHERE order_id = ? ORDER BY paid_on, id')
    .all(id)
    .map(toPayment);
  const logs = db
    .prepare<unknown[], LogRow>(
      `SELECT l.*, u.username FROM service_order_logs l LEFT JOIN users u ON u.id = l.user_id
       WHERE l.order_id = ? ORDER BY l.created_at DESC, l.id DESC`
    )
    .all(id)
    .map((row) => ({
      id: row.id,
      companyId: row.company_id,
      orderId: row.order_id,
      userId: row.user_id,
      action: row.action,
      note: row.note,
      createdAt: row.created_at,
      username: row.username
    }));

  return ok({ order, items, payments, logs });
}

// CREATE an order; logs CRIAR, ATRIBUIR and the status actions
export function createOrder(db: Db, actor: TenantActor, input: unknown): Result<OrderView> {
  const parsed = parseOrder(db, actor, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;
  const responsibleId = data.responsibleId ?? actor.user.id;

  const { fields, actions } = applyStatusAudit(
    {
      status: data.status,
      startedAt: null,
      finishedAt: null,
      finishedById: null,
      expectedDelivery: data.expectedDelivery
    },
    null,
    actor.user.id
  );

  const id = db.transaction(() => {
    const info = db
      .prepare(
        `INSERT INTO service_orders (company_id, client_id, vehicle_id, responsible_id, executor_id,
           created_by_id, finished_by_id, status, entry_date, expected_delivery, started_at,
           finished_at, problem, diagnosis, labor, discount, notes, created_at)
         VALUES (@companyId, @clientId, @vehicleId, @responsibleId, @executorId, @createdById,
           @finishedById, @status, @entryDate, @expectedDelivery, @startedAt, @finishedAt,
           @problem, @diagnosis, @labor, @discount, @notes, @createdAt)`
      )
      .run({
        ...data,
        ...fields,
        responsibleId,
        companyId: actor.company.id,
        createdById: actor.user.id,
        createdAt: nowIso()
      });
    const orderId = Number(info.lastInsertRowid);
    writeLog(db, actor, orderId, 'CRIAR');
    writeLog(db, actor, orderId, 'ATRIBUIR');
    for (const action of actions) writeLog(db, actor, orderId, action);
    return orderId;
  })();

  const order = findOrder(db, actor, id);
  return order ? ok(order) : err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
}

// UPDATE an order; an edit with nothing else to log is recorded as EDITAR
export function updateOrder(db: Db, actor: TenantActor, id: number, input: unknown): Result<OrderView> {
  const current = findOrder(db, actor, id);
  if (!current) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  const parsed = parseOrder(db, actor, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;
  // A manager's form that leaves out the field keeps the current owner; an empty value clears it
  const sent = typeof input === 'object' && input !== null && 'responsibleId' in input;
  const responsibleId = actor.isManager && !sent ? current.responsibleId : data.responsibleId;

  const { fields, actions } = applyStatusAudit(
    {
      status: data.status,
      startedAt: current.startedAt,
      finishedAt: current.finishedAt,
      finishedById: current.finishedById,
      expectedDelivery: data.expectedDelivery
    },
    current.status,
    actor.user.id
  );
  const responsibleChanged = responsibleId !== current.responsibleId;

  db.transaction(() => {
    db.prepare(`UPDATE service_orders SET ${ORDER_COLUMNS} WHERE id = @id AND company_id = @companyId`).run({
      ...data,
      ...fields,
      responsibleId,
      id,
      companyId: actor.company.id
    });
    if (responsibleChanged && responsibleId !== null) writeLog(db, actor, id, 'ATRIBUIR');
    for (const action of actions) writeLog(db, actor, id, action);
    if (!actions.length && !responsibleChanged && current.status === data.status) {
      writeLog(db, actor, id, 'EDITAR');
    }
  })();

  const order = findOrder(db, actor, id);
  return order ? ok(order) : err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
}

// DELETE an order (items, payments and logs go with it)
export function deleteOrder(db: Db, actor: TenantActor, id: number): Result<{ deletedId: number }> {
  if (!findOrder(db, actor, id)) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  db.prepare('DELETE FROM service_orders WHERE id = ? AND company_id = ?').run(id, actor.company.id);
  return ok({ deletedId: id });
}

interface ItemRow {
  id: number;
  company_id: number;
  order_id: number;
  product_id: number | null;
  description: string;
  qty: number;
  unit_price: number;
  subtotal: number;
}

const toItem = (row: ItemRow): OrderItem => ({
  id: row.id,
  companyId: row.company_id,
  orderId: row.order_id,
  productId: row.product_id,
  description: row.description,
  qty: row.qty,
  unitPrice: row.unit_price,
  subtotal: row.subtotal
});

interface PaymentRow {
  id: number;
  company_id: number;
  order_id: number;
  method: PaymentMethod;
  amount: number;
  paid_on: string;
}

export const toPayment = (row: PaymentRow): Payment => ({
  id: row.id,
  companyId: row.company_id,
  orderId: row.order_id,
  method: row.method,
  amount: row.amount,
  paidOn: row.paid_on
});

interface LogRow {
  id: number;
  company_id: number;
  order_id: number;
  user_id: number | null;
  action: OrderLogAction;
  note: string;
  created_at: string;
  username: string | null;
}

// ADD an item; a product line draws from stock in the same transaction
export function addItem(
  db: Db,
  actor: TenantActor,
  orderId: number,
  input: unknown
): Result<{ item: OrderItem; totals: OrderTotals }> {
  if (!findOrder(db, actor, orderId)) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  const parsed = validate(OrderItemSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  let description = data.description;
  if (data.productId !== null) {
    const product = findProduct(db, actor, data.productId);
    if (!product) return err('PRODUCT_NOT_FOUND', 'Produto não encontrado.');
    if (product.stock === null) {
      return err('STOCK_NOT_DEFINED', 'Defina o estoque do produto antes de lançar.');
    }
    if (!Number.isInteger(data.qty)) return err('INVALID_QUANTITY', 'Informe quantidade inteira.');
    if (data.qty > product.stock) {
      return err('INSUFFICIENT_STOCK', `Quantidade acima do estoque disponível (${product.stock}).`);
    }
    description = description || product.name;
  }

  const subtotal = roundMoney(data.qty * data.unitPrice);
  const itemId = db.transaction(() => {
    const info = db
      .prepare(
        `INSERT INTO service_order_items (company_id, order_id, product_id, description, qty, unit_price, subtotal)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(actor.company.id, orderId, data.productId, description, data.qty, data.unitPrice, subtotal);
    if (data.productId !== null) {
      db.prepare('UPDATE products SET stock = stock - ? WHERE id = ? AND company_id = ?').run(
        data.qty,
        data.productId,
        actor.company.id
      );
    }
    return Number(info.lastInsertRowid);
  })();

  const row = db
    .prepare<unknown[], ItemRow>('SELECT * FROM service_order_items WHERE id = ?')
    .get(itemId);
  const order = findOrder(db, actor, orderId);
  if (!row || !order) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  return ok({ item: toItem(row), totals: order.totals });
}

// ADD a payment
export function addPayment(
  db: Db,
  actor: TenantActor,
  orderId: number,
  input: unknown
): Result<{ payment: Payment; totals: OrderTotals }> {
  if (!findOrder(db, actor, orderId)) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  const parsed = validate(PaymentSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const paidOn = data.paidOn ? parseDateInput(data.paidOn) : today();
  if (!paidOn) return err('VALIDATION_ERROR', 'Data de pagamento inválida.');

  const info = db
    .prepare('INSERT INTO payments (company_id, order_id, method, amount, paid_on) VALUES (?, ?, ?, ?, ?)')
    .run(actor.company.id, orderId, data.method, roundMoney(data.amount), paidOn);
  const row = db
    .prepare<unknown[], PaymentRow>('SELECT * FROM payments WHERE id = ?')
    .get(Number(info.lastInsertRowid));
  const order = findOrder(db, actor, orderId);
  if (!row || !order) return err('ORDER_NOT_FOUND', ORDER_NOT_FOUND);
  return ok({ payment: toPayment(row), totals: order.totals });
}
