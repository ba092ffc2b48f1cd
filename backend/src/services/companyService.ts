import { addDays } from 'date-fns';
import { Db } from '../db/database';
import {
  CompanySchema,
  LogoSchema,
  PlanPricesSchema,
  RenewalSchema
} from '../models/schemas';
import {
  Actor,
  Company,
  Plan,
  PlanPeriod,
  PlanPrice,
  PlanSummary,
  PLAN_PERIODS,
  PLANS,
  Result,
  TenantActor,
  User
} from '../models/structures';
import { dateOf, daysBetween, nowIso, today } from '../utils/dates';
import { normalizeCep, validateCnpjCpf } from '../utils/documents';
import logger from '../modules/logger';
import { bit, err, flag, ok, validate } from './common';

export interface CompanyRow {
  id: number;
  name: string;
  cnpj_cpf: string;
  phone: string;
  cep: string;
  street: string;
  number: string;
  district: string;
  city: string;
  logo: string | null;
  plan: string;
  plan_period: string;
  plan_updated_at: string | null;
  plan_expires_at: string | null;
  is_active: number;
  payment_confirmed: number;
  renewal_period: string;
  renewal_requested_at: string | null;
  temporary_password: string;
  created_at: string;
}

const isPlan = (value: string): value is Plan => PLANS.some((plan) => plan === value);
const isPeriod = (value: string): value is PlanPeriod =>
  PLAN_PERIODS.some((period) => period === value);

export function toCompany(row: CompanyRow): Company {
  return {
    id: row.id,
    name: row.name,
    cnpjCpf: row.cnpj_cpf,
    phone: row.phone,
    cep: row.cep,
    street: row.street,
    number: row.number,
    district: row.district,
    city: row.city,
    logo: row.logo,
    plan: isPlan(row.plan) ? row.plan : 'BASICO',
    planPeriod: isPeriod(row.plan_period) ? row.plan_period : '30d',
    planUpdatedAt: row.plan_updated_at,
    planExpiresAt: row.plan_expires_at,
    isActive: flag(row.is_active),
    paymentConfirmed: flag(row.payment_confirmed),
    renewalPeriod: isPeriod(row.renewal_period) ? row.renewal_period : '',
    renewalRequestedAt: row.renewal_requested_at,
    createdAt: row.created_at
  };
}

export function findCompany(db: Db, id: number): Company | null {
  const row = db.prepare<unknown[], CompanyRow>('SELECT * FROM companies WHERE id = ?').get(id);
  return row ? toCompany(row) : null;
}

// Plan rules:
const PERIOD_DAYS: Record<PlanPeriod, number> = { '30d': 30, '6m': 182, '12m': 365 };

export function periodDays(period: string): number {
  return isPeriod(period) ? PERIOD_DAYS[period] : 30;
}

export function userLimit(company: Pick<Company, 'plan'>): number {
  return company.plan === 'PLUS' ? 30 : 6;
}

export function managerLimit(company: Pick<Company, 'plan'>): number {
  return company.plan === 'PLUS' ? 3 : 1;
}

export function isExpired(company: Pick<Company, 'planExpiresAt'>): boolean {
  if (!company.planExpiresAt) return false;
  return dateOf(company.planExpiresAt) <= today();
}

export function daysToExpiry(company: Pick<Company, 'planExpiresAt'>): number | null {
  if (!company.planExpiresAt) return null;
  return daysBetween(dateOf(company.planExpiresAt), today());
}

export function planSummary(company: Company): PlanSummary {
  return {
    plan: company.plan,
    period: company.planPeriod,
    updatedAt: company.planUpdatedAt ?? company.createdAt,
    expiresAt: company.planExpiresAt,
    daysToExpiry: daysToExpiry(company),
    expired: isExpired(company),
    userLimit: userLimit(company),
    managerLimit: managerLimit(company)
  };
}

/**
 * Applies the plan bookkeeping that runs on every company save:
 * a plan or period change restarts the plan, and the expiry follows the start date.
 */
export function applyPlanRules(next: Company, previous: Company | null): Company {
  const planChanged =
    previous !== null &&
    (previous.plan !== next.plan || previous.planPeriod !== next.planPeriod);
  const planUpdatedAt = planChanged || !next.planUpdatedAt ? nowIso() : next.planUpdatedAt;

  const updatedChanged = previous !== null && previous.planUpdatedAt !== planUpdatedAt;
  const planExpiresAt =
    !next.planExpiresAt || planChanged || updatedChanged
      ? addDays(new Date(planUpdatedAt), periodDays(next.planPeriod)).toISOString()
      : next.planExpiresAt;

  return {
    ...next,
    planUpdatedAt,
    planExpiresAt,
    isActive: !isExpired({ planExpiresAt })
  };
}

export type NewCompany = Omit<Company, 'id' | 'createdAt'> & { temporaryPassword?: string };

export function insertCompany(db: Db, input: NewCompany): Company {
  const draft: Company = { ...input, id: 0, createdAt: nowIso() };
  const company = applyPlanRules(draft, null);
  const info = db
    .prepare(
      `INSERT INTO companies (name, cnpj_cpf, phone, cep, street, number, district, city, logo,
         plan, plan_period, plan_updated_at, plan_expires_at, is_active, payment_confirmed,
         renewal_period, renewal_requested_at, temporary_password, created_at)
       VALUES (@name, @cnpjCpf, @phone, @cep, @street, @number, @district, @city, @logo,
         @plan, @planPeriod, @planUpdatedAt, @planExpiresAt, @isActive, @paymentConfirmed,
         @renewalPeriod, @renewalRequestedAt, @temporaryPassword, @createdAt)`
    )
    .run({
      ...company,
      isActive: bit(company.isActive),
      paymentConfirmed: bit(company.paymentConfirmed),
      temporaryPassword: input.temporaryPassword ?? ''
    });
  return { ...company, id: Number(info.lastInsertRowid) };
}

/** Persists every column of the company after the plan rules. */
export function saveCompany(db: Db, next: Company): Company {
  const previous = findCompany(db, next.id);
  const company = applyPlanRules(next, previous);
  db.prepare(
    `UPDATE companies SET name = @name, cnpj_cpf = @cnpjCpf, phone = @phone, cep = @cep,
       street = @street, number = @number, district = @district, city = @city, logo = @logo,
       plan = @plan, plan_period = @planPeriod, plan_updated_at = @planUpdatedAt,
       plan_expires_at = @planExpiresAt, is_active = @isActive,
       payment_confirmed = @paymentConfirmed, renewal_period = @renewalPeriod,
       renewal_requested_at = @renewalRequestedAt
     WHERE id = @id`
  ).run({
    ...company,
    isActive: bit(company.isActive),
    paymentConfirmed: bit(company.paymentConfirmed)
  });
  return company;
}

export function temporaryPasswordOf(db: Db, companyId: number): string {
  const row = db
    .prepare<unknown[], { temporary_password: string }>(
      'SELECT temporary_password FROM companies WHERE id = ?'
    )
    .get(companyId);
  return row?.temporary_password ?? '';
}

export function setTemporaryPassword(db: Db, companyId: number, password: string): void {
  db.prepare('UPDATE companies SET temporary_password = ? WHERE id = ?').run(password, companyId);
}

// Tenant access:
export const PAYMENT_PENDING_MESSAGE =
  'Cadastro recebido. Assim que o pagamento for confirmado, liberaremos o acesso ao sistema e enviaremos uma notificação por e-mail ou WhatsApp.';
export const COMPANY_INACTIVE_MESSAGE = 'Sua empresa está inativa. Entre em contato para regularizar.';

/** Re-derives is_active from expiry and payment, writing it back only when it changed. */
export function syncCompanyStatus(db: Db, company: Company): Company {
  const shouldBeActive = !isExpired(company) && company.paymentConfirmed;
  if (shouldBeActive === company.isActive) return company;
  db.prepare('UPDATE companies SET is_active = ? WHERE id = ?').run(bit(shouldBeActive), company.id);
  return { ...company, isActive: shouldBeActive };
}

/** Resolves the user's company and blocks it when unpaid or inactive. Superusers pass. */
export function checkTenantAccess(db: Db, user: User): Result<Company | null> {
  if (user.companyId === null) return ok(null);
  const found = findCompany(db, user.companyId);
  if (!found) return ok(null);

  const company = syncCompanyStatus(db, found);
  if (!user.isSuperuser) {
    if (!company.paymentConfirmed) return err('PAYMENT_PENDING', PAYMENT_PENDING_MESSAGE);
    if (!company.isActive) return err('COMPANY_INACTIVE', COMPANY_INACTIVE_MESSAGE);
  }
  return ok(company);
}

export function requireCompany(actor: Actor): Result<TenantActor> {
  const { company } = actor;
  if (!company) return err('COMPANY_REQUIRED', 'Empresa não encontrada.');
  return ok({ ...actor, company });
}

// Service functions:
// GET the caller's company with its plan
export function getCompanyProfile(actor: TenantActor): Result<{ company: Company; plan: PlanSummary }> {
  return ok({ company: actor.company, plan: planSummary(actor.company) });
}

// UPDATE company registration data
export function updateCompany(
  db: Db,
  actor: TenantActor,
  input: unknown
): Result<{ company: Company; plan: PlanSummary }> {
  const parsed = validate(CompanySchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const document = validateCnpjCpf(data.cnpjCpf);
  if (!document.ok) return document;
  const cep = normalizeCep(data.cep);
  if (!cep.ok) return cep;

  const company = saveCompany(db, {
    ...actor.company,
    name: data.name,
    cnpjCpf: document.data,
    phone: data.phone,
    cep: cep.data,
    street: data.street,
    number: data.number,
    district: data.district,
    city: data.city
  });
  return ok({ company, plan: planSummary(company) });
}

export const MAX_LOGO_BYTES = 2 * 1024 * 1024;
const LOGO_PATTERN = /^data:image\/(png|jpeg|jpg|webp);base64,([A-Za-z0-9+/=\s]+)$/;

// SET or clear the logo (image data URL)
export function updateLogo(db: Db, actor: TenantActor, input: unknown): Result<Company> {
  const parsed = validate(LogoSchema, input);
  if (!parsed.ok) return parsed;

  const { dataUrl } = parsed.data;
  if (dataUrl !== null) {
    const match = LOGO_PATTERN.exec(dataUrl.trim());
    if (!match) {
      return err('VALIDATION_ERROR', 'Envie uma imagem PNG, JPG ou WEBP.');
    }
    if (Buffer.from(match[2], 'base64').length > MAX_LOGO_BYTES) {
      return err('VALIDATION_ERROR', 'A logomarca deve ter no máximo 2 MB.');
    }
  }

  const company = saveCompany(db, { ...actor.company, logo: dataUrl === null ? null : dataUrl.trim() });
  return ok(company);
}

// REQUEST a plan renewal; confirmed later by the platform operator
export function requestRenewal(
  db: Db,
  actor: TenantActor,
  input: unknown
): Result<{ company: Company; message: string }> {
  const parsed = validate(RenewalSchema, input);
  if (!parsed.ok) return err('VALIDATION_ERROR', 'Selecione um período válido.');

  const company = saveCompany(db, {
    ...actor.company,
    renewalPeriod: parsed.data.period,
    renewalRequestedAt: nowIso()
  });
  logger.info('renewal requested', { companyId: company.id, period: parsed.data.period });
  return ok({
    company,
    message: 'Solicitação de renovação enviada. Confirmação após o pagamento.'
  });
}

interface PlanPriceRow {
  id: number;
  plan: Plan;
  period: PlanPeriod;
  amount: number;
  pix_copy_paste: string;
  updated_at: string;
}

const toPlanPrice = (row: PlanPriceRow): PlanPrice => ({
  id: row.id,
  plan: row.plan,
  period: row.period,
  amount: row.amount,
  pixCopyPaste: row.pix_copy_paste,
  updatedAt: row.updated_at
});

// LIST plan prices
export function listPlanPrices(db: Db): PlanPrice[] {
  const rows = db
    .prepare<unknown[], PlanPriceRow>(
      `SELECT * FROM plan_prices
       ORDER BY plan, CASE period WHEN '30d' THEN 1 WHEN '6m' THEN 2 ELSE 3 END`
    )
    .all();
  return rows.map(toPlanPrice);
}

// UPSERT plan prices, one row per (plan, period)
export function upsertPlanPrices(db: Db, input: unknown): Result<PlanPrice[]> {
  const parsed = validate(PlanPricesSchema, input);
  if (!parsed.ok) return parsed;

  const upsert = db.prepare(
    `INSERT INTO plan_prices (plan, period, amount, pix_copy_paste, updated_at)
     VALUES (@plan, @period, @amount, @pixCopyPaste, @updatedAt)
     ON CONFLICT (plan, period) DO UPDATE SET
       amount = excluded.amount,
       pix_copy_paste = excluded.pix_copy_paste,
       updated_at = excluded.updated_at`
  );
  const updatedAt = nowIso();
  db.transaction(() => {
    for (const price of parsed.data.prices) upsert.run({ ...price, updatedAt });
  })();
  return ok(listPlanPrices(db));
}
