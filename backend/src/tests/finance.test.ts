import { createExpense, getCashRegister, mergeSeries, RANGE_WARNING, resolvePeriod } from '../services/cashService';
import { buildDashboardData, getDashboardSummary, parseLimit, resolveRange } from '../services/dashboardService';
import { getReport } from '../services/reportService';
import { addItem, addPayment, createOrder } from '../services/serviceOrderService';
import { addDaysIso, daysBetween, monthLabel, today } from '../utils/dates';
import { freshDb, seedClientWithVehicle, seedTenant, seedUser, tenantOf } from './__mocks__/fixtures';

const MARCH = { inicio: '01/03/2024', fim: '31/03/2024' };

/**
 * March 2024: the manager's order (labor 300, one 2 x 40 item, 200 paid)
 * and the mechanic's order (labor 100, 50 paid), plus a 30 expense.
 */
function march() {
  const db = freshDb();
  const { company, manager, actor } = seedTenant(db);
  const staff = tenantOf(seedUser(db, company, { username: 'mecanico' }), company);
  const { client, vehicle } = seedClientWithVehicle(db, actor);
  const base = { clientId: client.id, vehicleId: vehicle.id, problem: 'Revisão' };

  const managerOrder = createOrder(db, actor, { ...base, entryDate: '2024-03-01', labor: 300 });
  const staffOrder = createOrder(db, staff, { ...base, entryDate: '2024-03-10', labor: 100 });
  if (!managerOrder.ok || !staffOrder.ok) throw new Error('order setup failed');

  addItem(db, actor, managerOrder.data.id, { description: 'Óleo', qty: 2, unitPrice: 40 });
  addPayment(db, actor, managerOrder.data.id, { method: 'Pix', amount: 200, paidOn: '2024-03-05' });
  addPayment(db, staff, staffOrder.data.id, { method: 'Dinheiro', amount: 50, paidOn: '2024-03-12' });
  createExpense(db, actor, { description: 'Aluguel', amount: 30, date: '20/03/2024' });

  return { db, manager, actor, staff, client, managerOrder: managerOrder.data, staffOrder: staffOrder.data };
}

describe('cashService', () => {
  test('register lists income and expenses for the period', () => {
    const { db, actor } = march();
    const register = getCashRegister(db, actor, MARCH);

    expect(register.start).toBe('2024-03-01');
    expect(register.end).toBe('2024-03-31');
    expect(register.income.map((p) => [p.method, p.amount, p.clientName])).toEqual([
      ['Pix', 200, 'MARIA SILVA'],
      ['Dinheiro', 50, 'MARIA SILVA']
    ]);
    expect(register.outflow.map((e) => [e.description, e.amount, e.date])).toEqual([['Aluguel', 30, '2024-03-20']]);
    expect([register.incomeTotal, register.outflowTotal, register.balance]).toEqual([250, 30, 220]);
    expect(register.warnings).toEqual([]);
  });

  test('an inverted period falls back to the current month with a warning', () => {
    const period = resolvePeriod({ inicio: '31/03/2024', fim: '01/03/2024' }, { start: '2024-01-01', end: '2024-01-31' });
    expect(period).toEqual({ start: '2024-01-01', end: '2024-01-31', warnings: [RANGE_WARNING] });

    const unreadable = resolvePeriod({ inicio: 'ontem' }, { start: '2024-01-01', end: '2024-01-31' });
    expect(unreadable).toEqual({ start: '2024-01-01', end: '2024-01-31', warnings: [] });
  });

  test('expenses need a description', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const result = createExpense(db, actor, { amount: 10 });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Descrição é obrigatório.');

    const dated = createExpense(db, actor, { description: 'Luz', amount: '12,5' });
    expect(dated.ok).toBe(true);
    if (dated.ok) expect(dated.data).toMatchObject({ amount: 12.5, date: today() });
  });

  test('chart series merge both sides against the largest value', () => {
    const points = mergeSeries(
      new Map([['2024-03-01', 200]]),
      new Map([
        ['2024-03-01', 50],
        ['2024-02-01', 100]
      ]),
      monthLabel
    );
    expect(points).toEqual([
      { label: 'Fev/2024', iso: '2024-02-01', income: 0, outflow: 100, balance: -100, incomePct: 0, outflowPct: 50 },
      { label: 'Mar/2024', iso: '2024-03-01', income: 200, outflow: 50, balance: 150, incomePct: 100, outflowPct: 25 }
    ]);
  });
});

describe('reportService', () => {
  test('open balances are listed per order, newest first', () => {
    const { db, actor, client, managerOrder, staffOrder } = march();
    const report = getReport(db, actor, MARCH);

    expect(report.orders).toHaveLength(2);
    expect(report.byStatus.find((row) => row.status === 'ABERTA')).toEqual({ status: 'ABERTA', label: 'Aberta', count: 2 });
    expect([report.revenue, report.expenses]).toEqual([250, 30]);
    expect(report.openClients).toEqual([{ id: client.id, name: 'MARIA SILVA', phone: '11988887777' }]);
    expect(report.pending).toEqual([
      { client: 'MARIA SILVA', phone: '11988887777', orderId: staffOrder.id, balance: 50 },
      { client: 'MARIA SILVA', phone: '11988887777', orderId: managerOrder.id, balance: 180 }
    ]);
  });
});

describe('reportService: period', () => {
  test('a single start after today resets the report period with a warning', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);
    const day = today();
    const future = addDaysIso(day, 10);

    const report = getReport(db, actor, { inicio: future });
    expect([report.start, report.end]).toEqual([addDaysIso(day, -30), day]);
    expect(report.warnings).toEqual([RANGE_WARNING]);

    // the cash register only checks a range given at both ends
    const register = getCashRegister(db, actor, { inicio: future });
    expect([register.start, register.end]).toEqual([future, day]);
    expect(register.warnings).toEqual([]);
  });
});

describe('dashboardService', () => {
  const period = { start: '2024-03-01', end: '2024-03-31' };

  test('managers see the whole company', () => {
    const { db, actor, manager } = march();
    const data = buildDashboardData(db, actor, period);

    expect(data.financeiro).toEqual({
      lucroMensal: { labels: ['Mar/2024'], entradas: [250], despesas: [30], lucro: [220] },
      saldoPeriodo: 220,
      saldoGeral: 220
    });
    expect(data.operacional.statusOs).toEqual({ labels: ['Aberta'], valores: [2] });
    expect(data.operacional.osPorFuncionario).toEqual({ labels: [manager.username, 'mecanico'], valores: [1, 1] });
    expect(data.produtos.maisVendidos).toEqual({ labels: ['Óleo'], qtd: [2], total: [80] });
    expect(data.clientes.maisLucrativos).toEqual({ labels: ['MARIA SILVA'], valores: [250] });
    expect(data.clientes.recorrencia).toEqual({ labels: ['Mar/2024'], clientes: [1], recorrentes: [1] });
  });

  test('staff only see their own orders and payments', () => {
    const { db, staff } = march();
    const data = buildDashboardData(db, staff, period);

    expect(data.financeiro.saldoGeral).toBe(20);
    expect(data.operacional.statusOs.valores).toEqual([1]);
    expect(data.produtos.maisVendidos.labels).toEqual([]);
    expect(data.clientes.maisLucrativos.valores).toEqual([50]);
  });

  test('swapped custom dates are put in order', () => {
    const { db, actor } = march();
    const data = buildDashboardData(db, actor, { start: '31/03/2024', end: '01/03/2024' });
    expect(data.periodo).toEqual({
      start: '2024-03-01',
      end: '2024-03-31',
      operacionalStart: '2024-03-01',
      operacionalEnd: '2024-03-31'
    });
  });

  test('summary counts orders by status', () => {
    const { db, actor } = march();
    const summary = getDashboardSummary(db, actor, {});
    expect(summary).toMatchObject({ openCount: 2, waitingCount: 0, executionCount: 0, range: '6m' });
  });

  test('range keys and limits', () => {
    const days = resolveRange('30d', { months: 6 });
    expect(days.end).toBe(today());
    expect(daysBetween(days.end, days.start)).toBe(29);
    expect(resolveRange('6m', { days: 30 }).start.endsWith('-01')).toBe(true);

    expect([parseLimit('5'), parseLimit('0'), parseLimit('80'), parseLimit('x')]).toEqual([5, 10, 50, 10]);
  });
});
