import { Db } from '../db/database';
import { ApprovalSchema, SignupSchema } from '../models/schemas';
import { Company, Result, User } from '../models/structures';
import logger from '../modules/logger';
import { nowIso } from '../utils/dates';
import { normalizeCep, validateCnpjCpf } from '../utils/documents';
import {
  CompanyRow,
  findCompany,
  insertCompany,
  saveCompany,
  setTemporaryPassword,
  temporaryPasswordOf,
  toCompany
} from './companyService';
import { randomPassword } from './crypto';
import { Mailer, textToHtml } from './emailService';
import { checkPasswordPair, insertUser, setPassword, toUser, UserRow, usernameTaken } from './userService';
import { err, ok, validate } from './common';

export interface SignupResult {
  company: Company;
  user: User;
  notificationSent: boolean;
}

function checkSignupEmail(db: Db, email: string): Result<string> {
  const existing = db
    .prepare<unknown[], { payment_confirmed: number | null }>(
      `SELECT c.payment_confirmed FROM users u LEFT JOIN companies c ON c.id = u.company_id
       WHERE u.email = ? COLLATE NOCASE LIMIT 1`
    )
    .get(email);
  if (!existing) return ok(email);
  if (existing.payment_confirmed === 0) {
    return err(
      'DUPLICATE_EMAIL',
      'Já existe um cadastro pendente para este e-mail. Aguarde a liberação ou entre em contato com o suporte.'
    );
  }
  return err(
    'DUPLICATE_EMAIL',
    'Este e-mail já está em uso. Se você já possui conta, faça login ou recupere a senha.'
  );
}

async function notifyNewSignup(
  mailer: Mailer,
  contactEmail: string,
  company: Company,
  user: User
): Promise<boolean> {
  const responsible = `${user.firstName} ${user.lastName}`.trim() || user.username;
  const body = [
    'Solicitação de liberação de acesso ao sistema de gestão de oficina.',
    '',
    `Empresa: ${company.name}`,
    `Responsavel: ${responsible}`,
    `Email: ${user.email || '-'}`,
    `Telefone: ${company.phone || '-'}`,
    `CNPJ/CPF: ${company.cnpjCpf || '-'}`
  ].join('\n');

  const outcome = await mailer.send({
    to: contactEmail,
    subject: 'Nova solicitacao de liberacao de acesso',
    html: textToHtml(body),
    replyTo: user.email || undefined
  });
  if (!outcome.ok) logger.warn('signup notification not sent', { companyId: company.id, detail: outcome.detail });
  return outcome.ok;
}

// SIGNUP: a new company waiting for payment, plus its manager
export async function signup(
  db: Db,
  mailer: Mailer,
  contactEmail: string,
  input: unknown
): Promise<Result<SignupResult>> {
  const parsed = validate(SignupSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const document = validateCnpjCpf(data.cnpjCpf);
  if (!document.ok) return document;
  const cep = normalizeCep(data.cep, true);
  if (!cep.ok) return cep;
  if (usernameTaken(db, data.username)) {
    return err('DUPLICATE_USERNAME', 'Este login já está em uso.');
  }
  const email = checkSignupEmail(db, data.email);
  if (!email.ok) return email;
  const password = checkPasswordPair(data.password1, data.password2, true);
  if (!password.ok) return password;

  const { company, user } = db.transaction(() => {
    const created = insertCompany(db, {
      name: data.companyName,
      cnpjCpf: document.data,
      phone: data.phone,
      cep: cep.data,
      street: data.street,
      number: data.number,
      district: data.district,
      city: data.city,
      logo: null,
      plan: 'BASICO',
      planPeriod: '30d',
      planUpdatedAt: null,
      planExpiresAt: null,
      isActive: true,
      paymentConfirmed: false,
      renewalPeriod: '',
      renewalRequestedAt: null,
      temporaryPassword: password.data
    });
    const manager = insertUser(db, {
      companyId: created.id,
      username: data.username,
      email: email.data,
      password: password.data,
      firstName: data.firstName,
      lastName: data.lastName,
      recoveryEmail: data.recoveryEmail,
      isManager: true
    });
    return { company: created, user: manager };
  })();

  logger.info('signup received', { companyId: company.id, username: user.username });
  const notificationSent = await notifyNewSignup(mailer, contactEmail, company, user);
  return ok({ company, user, notificationSent });
}

export type CompanyFilter = 'todos' | 'pendentes' | 'cadastro' | 'renovacao';

const RENEWAL_SQL = "renewal_period <> ''";
const SIGNUP_SQL = `payment_confirmed = 0 AND NOT (${RENEWAL_SQL})`;
const PENDING_SQL = `(payment_confirmed = 0 OR ${RENEWAL_SQL})`;

const FILTERS: Record<CompanyFilter, string> = {
  todos: '1 = 1',
  pendentes: PENDING_SQL,
  cadastro: SIGNUP_SQL,
  renovacao: RENEWAL_SQL
};

const isFilter = (value: string): value is CompanyFilter => value in FILTERS;

// LIST companies for the approval screen, pending first
export function listCompanies(
  db: Db,
  tipo: unknown
): { items: Company[]; pendingCount: number; filter: CompanyFilter } {
  const requested = typeof tipo === 'string' ? tipo.trim().toLowerCase() : '';
  const filter: CompanyFilter = isFilter(requested) ? requested : 'todos';

  const rows = db
    .prepare<unknown[], CompanyRow>(
      `SELECT * FROM companies WHERE ${FILTERS[filter]}
       ORDER BY CASE WHEN ${PENDING_SQL} THEN 0 ELSE 1 END,
         renewal_requested_at DESC, created_at DESC`
    )
    .all();
  const pending = db
    .prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM companies WHERE ${PENDING_SQL}`)
    .get();

  return { items: rows.map(toCompany), pendingCount: pending?.n ?? 0, filter };
}

// SUMMARY of what waits for the platform operator
export function pendingSummary(db: Db): {
  renewals: Company[];
  renewalCount: number;
  signupCount: number;
} {
  const renewals = db
    .prepare<unknown[], CompanyRow>(
      `SELECT * FROM companies WHERE ${RENEWAL_SQL}
       ORDER BY renewal_requested_at DESC, created_at DESC`
    )
    .all()
    .map(toCompany);
  const signups = db
    .prepare<unknown[], { n: number }>('SELECT COUNT(*) AS n FROM companies WHERE payment_confirmed = 0')
    .get();

  return {
    renewals: renewals.slice(0, 10),
    renewalCount: renewals.length,
    signupCount: signups?.n ?? 0
  };
}

export interface ApprovalResult {
  company: Company;
  messages: string[];
  warnings: string[];
}

// APPROVE (or block) a company; the first confirmation mails the access credentials
export async function approveCompany(
  db: Db,
  mailer: Mailer,
  companyId: number,
  input: unknown
): Promise<Result<ApprovalResult>> {
  const found = findCompany(db, companyId);
  if (!found) return err('COMPANY_NOT_FOUND', 'Empresa não encontrada.');
  const parsed = validate(ApprovalSchema, input);
  if (!parsed.ok) return parsed;
  const { paymentConfirmed, confirmRenewal } = parsed.data;

  const messages: string[] = [];
  const warnings: string[] = [];
  const wasConfirmed = found.paymentConfirmed;
  let next: Company = { ...found, paymentConfirmed };

  const renewal = found.renewalPeriod;
  if (confirmRenewal && renewal) {
    if (!paymentConfirmed) {
      warnings.push('Confirme o pagamento antes de renovar o plano.');
    } else {
      next = {
        ...next,
        planPeriod: renewal,
        planUpdatedAt: nowIso(),
        renewalPeriod: '',
        renewalRequestedAt: null
      };
      messages.push(`Renovação confirmada para ${next.name}.`);
    }
  }

  const company = saveCompany(db, next);
  logger.info('company approval saved', { companyId, paymentConfirmed, confirmRenewal });

  if (!paymentConfirmed) {
    warnings.push(`Acesso bloqueado para ${company.name}.`);
    return ok({ company, messages, warnings });
  }

  messages.push(`Acesso liberado para ${company.name}.`);
  if (wasConfirmed) return ok({ company, messages, warnings });

  const owner = db
    .prepare<unknown[], UserRow>(
      'SELECT * FROM users WHERE company_id = ? ORDER BY date_joined, id LIMIT 1'
    )
    .get(company.id);
  if (!owner) {
    warnings.push('Nao foi encontrado usuario para esta empresa.');
    return ok({ company, messages, warnings });
  }

  const temporary = temporaryPasswordOf(db, company.id);
  let password = temporary;
  if (!password) {
    password = randomPassword(12);
    setPassword(db, owner.id, password);
  }

  const user = toUser(owner);
  const sent = await sendAccessEmail(mailer, company, user, password);
  if (sent.ok) {
    if (temporary) setTemporaryPassword(db, company.id, '');
  } else {
    warnings.push(
      `Email de acesso nao enviado. ${sent.detail ?? 'Verifique RESEND_API_KEY, EMAIL_FROM e CONTACT_EMAIL.'}`
    );
  }
  return ok({ company, messages, warnings });
}

async function sendAccessEmail(
  mailer: Mailer,
  company: Company,
  user: User,
  password: string
): Promise<{ ok: boolean; detail: string | null }> {
  if (!user.email) return { ok: false, detail: 'Usuario sem email cadastrado.' };
  const body = [
    'Seu acesso ao sistema de gestão de oficina foi liberado.',
    '',
    `Login: ${user.username}`,
    `Senha: ${password}`,
    `Empresa: ${company.name}`
  ].join('\n');
  return mailer.send({
    to: user.email,
    subject: 'Acesso liberado - Gestão de Oficina',
    html: textToHtml(body)
  });
}
