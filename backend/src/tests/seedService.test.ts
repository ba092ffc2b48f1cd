import { login } from '../services/authService';
import { DEMO_PASSWORD, DEMO_USERNAME, seedDemo } from '../services/seedService';
import { getOrderDetail } from '../services/serviceOrderService';
import { freshDb, tenantOf } from './__mocks__/fixtures';

describe('seedDemo', () => {
  test('creates a usable demo tenant', () => {
    const db = freshDb();
    const summary = seedDemo(db);

    const session = login(db, { secretKey: 'test-secret', tokenTtlHours: 1 }, {
      username: DEMO_USERNAME,
      password: DEMO_PASSWORD
    });
    if (!session.ok || !session.data.company) throw new Error('demo login failed');
    expect(session.data.user).toMatchObject({ isSuperuser: true, isManager: true, email: 'admin@demo.com' });
    expect(session.data.company.name).toBe('Oficina Demo');

    const detail = getOrderDetail(db, tenantOf(session.data.user, session.data.company), summary.orderId);
    if (!detail.ok) throw new Error(detail.error.message);
    expect(detail.data.order).toMatchObject({ clientName: 'CLIENTE DEMO', plate: 'ABC1D23' });
    expect(detail.data.order.totals).toEqual({ itemsTotal: 90, total: 240, paidTotal: 100, balance: 140 });
  });

  test('running twice adds nothing', () => {
    const db = freshDb();
    const first = seedDemo(db);
    expect(seedDemo(db)).toEqual(first);

    const count = (table: string) =>
      db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n;
    expect(['companies', 'users', 'clients', 'vehicles', 'service_orders', 'service_order_items', 'payments'].map(count)).toEqual([
      1, 1, 1, 1, 1, 1, 1
    ]);
  });
});
