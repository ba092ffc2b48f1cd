import { Db } from '../db/database';
import { LoginSchema } from '../models/schemas';
import { Actor, Company, PlanSummary, Result, User } from '../models/structures';
import logger from '../modules/logger';
import { checkTenantAccess, planSummary } from './companyService';
import { signAccessToken, verifyAccessToken, verifyPassword } from './crypto';
import { findUserRow, findUserRowByUsername, isManagerUser, toUser } from './userService';
import { err, ok, validate } from './common';

export interface AuthSettings {
  secretKey: string;
  tokenTtlHours: number;
}

export interface Session {
  user: User;
  company: Company | null;
  plan: PlanSummary | null;
}

const INVALID_CREDENTIALS = 'Usuário ou senha inválidos.';

function toActor(user: User, company: Company | null): Actor {
  return { user, company, isManager: isManagerUser(user) };
}

export function describeSession(actor: Actor): Session {
  return {
    user: actor.user,
    company: actor.company,
    plan: actor.company ? planSummary(actor.company) : null
  };
}

// LOGIN with username and password
export function login(
  db: Db,
  settings: AuthSettings,
  input: unknown
): Result<Session & { token: string }> {
  const parsed = validate(LoginSchema, input);
  if (!parsed.ok) return parsed;
  const { username, password } = parsed.data;

  const row = findUserRowByUsername(db, username);
  if (!row || !verifyPassword(password, row.password_hash) || row.is_active !== 1) {
    logger.warn('login failed', { username });
    return err('INVALID_CREDENTIALS', INVALID_CREDENTIALS);
  }

  const user = toUser(row);
  const access = checkTenantAccess(db, user);
  if (!access.ok) return access;

  const token = signAccessToken(user.id, settings.secretKey, settings.tokenTtlHours);
  return ok({ token, ...describeSession(toActor(user, access.data)) });
}

/** Resolves "Bearer <token>" to the calling user and company, applying the tenant rules. */
export function authenticate(
  db: Db,
  settings: AuthSettings,
  authorization: string | undefined
): Result<Actor> {
  const match = /^Bearer\s+(\S+)$/i.exec(authorization ?? '');
  if (!match) return err('UNAUTHENTICATED', 'Autenticação necessária.');

  const userId = verifyAccessToken(match[1], settings.secretKey);
  if (userId === null) return err('UNAUTHENTICATED', 'Sessão inválida ou expirada.');

  const row = findUserRow(db, userId);
  if (!row || row.is_active !== 1) return err('UNAUTHENTICATED', 'Sessão inválida ou expirada.');

  const user = toUser(row);
  const access = checkTenantAccess(db, user);
  if (!access.ok) return access;
  return ok(toActor(user, access.data));
}
