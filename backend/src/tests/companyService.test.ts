import {
  checkTenantAccess,
  COMPANY_INACTIVE_MESSAGE,
  findCompany,
  listPlanPrices,
  managerLimit,
  PAYMENT_PENDING_MESSAGE,
  periodDays,
  planSummary,
  requestRenewal,
  saveCompany,
  updateCompany,
  updateLogo,
  upsertPlanPrices,
  userLimit
} from '../services/companyService';
import { freshDb, seedCompany, seedTenant, seedUser } from './__mocks__/fixtures';

const daysAgo = (days: number) => new Date(Date.now() - days * 86_400_000).toISOString();

describe('plan rules', () => {
  test('limits depend on the plan', () => {
    expect(userLimit({ plan: 'BASICO' })).toBe(6);
    expect(userLimit({ plan: 'PLUS' })).toBe(30);
    expect(managerLimit({ plan: 'BASICO' })).toBe(1);
    expect(managerLimit({ plan: 'PLUS' })).toBe(3);
  });

  test('period lengths, unknown periods count as 30 days', () => {
    expect(periodDays('30d')).toBe(30);
    expect(periodDays('6m')).toBe(182);
    expect(periodDays('12m')).toBe(365);
    expect(periodDays('2y')).toBe(30);
  });

  test('a new company starts its plan now and expires after the period', () => {
    const db = freshDb();
    const company = seedCompany(db);
    expect(company.planUpdatedAt).not.toBeNull();
    expect(company.isActive).toBe(true);
    const summary = planSummary(company);
    expect(summary.daysToExpiry).toBe(30);
    expect(summary.expired).toBe(false);
    expect(summary.userLimit).toBe(6);
  });

  test('changing the period restarts the plan', () => {
    const db = freshDb();
    const company = seedCompany(db, { planUpdatedAt: daysAgo(10) });
    expect(planSummary(company).daysToExpiry).toBe(20);

    const saved = saveCompany(db, { ...company, planPeriod: '12m' });
    expect(planSummary(saved).daysToExpiry).toBe(365);
    expect(findCompany(db, company.id)?.planPeriod).toBe('12m');
  });

  test('an expiry in the past deactivates the company', () => {
    const db = freshDb();
    const company = seedCompany(db, { planUpdatedAt: daysAgo(40) });
    expect(company.isActive).toBe(false);
    expect(planSummary(company).expired).toBe(true);
  });
});

describe('tenant access', () => {
  test('unpaid companies are blocked with the pending message', () => {
    const db = freshDb();
    const company = seedCompany(db, { paymentConfirmed: false });
    const user = seedUser(db, company, { username: 'ana' });

    const result = checkTenantAccess(db, user);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.code).toBe('PAYMENT_PENDING');
      expect(result.error.message).toBe(PAYMENT_PENDING_MESSAGE);
    }
    expect(findCompany(db, company.id)?.isActive).toBe(false);
  });

  test('expired companies are blocked, superusers still pass', () => {
    const db = freshDb();
    const company = seedCompany(db, { planUpdatedAt: daysAgo(40) });
    const staff = seedUser(db, company, { username: 'bia' });
    const root = seedUser(db, company, { username: 'root', isSuperuser: true });

    const blocked = checkTenantAccess(db, staff);
    expect(blocked.ok).toBe(false);
    if (!blocked.ok) {
      expect(blocked.error.code).toBe('COMPANY_INACTIVE');
      expect(blocked.error.message).toBe(COMPANY_INACTIVE_MESSAGE);
    }
    expect(checkTenantAccess(db, root).ok).toBe(true);
  });

  test('a stale inactive flag is corrected and persisted', () => {
    const db = freshDb();
    const company = seedCompany(db);
    db.prepare('UPDATE companies SET is_active = 0 WHERE id = ?').run(company.id);
    const user = seedUser(db, company, { username: 'caio' });

    const result = checkTenantAccess(db, user);
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.data?.isActive).toBe(true);
    expect(findCompany(db, company.id)?.isActive).toBe(true);
  });

  test('users without a company pass with no tenant', () => {
    const db = freshDb();
    const root = seedUser(db, null, { username: 'root', isSuperuser: true });
    expect(checkTenantAccess(db, root)).toEqual({ ok: true, data: null });
  });
});

describe('company profile', () => {
  test('update validates the document and formats the CEP', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const bad = updateCompany(db, actor, { name: 'Oficina', cnpjCpf: '123.456.789-00' });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.message).toBe('CPF inválido.');

    const good = updateCompany(db, actor, { name: ' Oficina Nova ', cnpjCpf: '529.982.247-25', cep: '01310100' });
    expect(good.ok).toBe(true);
    if (good.ok) {
      expect(good.data.company.name).toBe('Oficina Nova');
      expect(good.data.company.cnpjCpf).toBe('52998224725');
      expect(good.data.company.cep).toBe('01310-100');
    }
  });

  test('logo must be an image data URL and can be removed', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const bad = updateLogo(db, actor, { dataUrl: 'data:text/plain;base64,aGVsbG8=' });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.message).toBe('Envie uma imagem PNG, JPG ou WEBP.');

    const set = updateLogo(db, actor, { dataUrl: 'data:image/png;base64,iVBORw0KGgo=' });
    expect(set.ok).toBe(true);
    expect(findCompany(db, actor.company.id)?.logo).toBe('data:image/png;base64,iVBORw0KGgo=');

    const cleared = updateLogo(db, actor, { dataUrl: null });
    expect(cleared.ok).toBe(true);
    expect(findCompany(db, actor.company.id)?.logo).toBeNull();
  });

  test('renewal request stores the period', () => {
    const db = freshDb();
    const { actor } = seedTenant(db);

    const bad = requestRenewal(db, actor, { period: '2y' });
    expect(bad.ok).toBe(false);
    if (!bad.ok) expect(bad.error.message).toBe('Selecione um período válido.');

    const good = requestRenewal(db, actor, { period: '6m' });
    expect(good.ok).toBe(true);
    if (good.ok) {
      expect(good.data.message).toBe('Solicitação de renovação enviada. Confirmação após o pagamento.');
      expect(good.data.company.renewalPeriod).toBe('6m');
      expect(good.data.company.renewalRequestedAt).not.toBeNull();
    }
  });
});

describe('plan prices', () => {
  test('upsert keeps one row per plan and period', () => {
    const db = freshDb();
    upsertPlanPrices(db, { prices: [{ plan: 'BASICO', period: '30d', amount: 99 }] });
    const result = upsertPlanPrices(db, {
      prices: [
        { plan: 'BASICO', period: '30d', amount: '89,90', pixCopyPaste: 'pix-code' },
        { plan: 'PLUS', period: '12m', amount: 1500 }
      ]
    });
    expect(result.ok).toBe(true);
    const prices = listPlanPrices(db);
    expect(prices).toHaveLength(2);
    expect(prices[0]).toMatchObject({ plan: 'BASICO', period: '30d', amount: 89.9, pixCopyPaste: 'pix-code' });
    expect(prices[1]).toMatchObject({ plan: 'PLUS', period: '12m', amount: 1500 });
  });

  test('negative amounts are rejected', () => {
    const db = freshDb();
    const result = upsertPlanPrices(db, { prices: [{ plan: 'PLUS', period: '6m', amount: -1 }] });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('Valor não pode ser negativo.');
  });
});
