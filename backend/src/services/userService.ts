import { Db } from '../db/database';
import { UserData, UserSchema } from '../models/schemas';
import { Page, Result, TenantActor, User } from '../models/structures';
import { nowIso } from '../utils/dates';
import { likePattern } from '../utils/text';
import { managerLimit, userLimit } from './companyService';
import { hashPassword } from './crypto';
import { bit, err, flag, offsetOf, ok, PAGE_SIZE, pageNumber, toPage, validate } from './common';

export interface UserRow {
  id: number;
  company_id: number | null;
  username: string;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  recovery_email: string;
  recovery_phone: string;
  is_manager: number;
  is_superuser: number;
  is_active: number;
  date_joined: string;
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    companyId: row.company_id,
    username: row.username,
    email: row.email,
    firstName: row.first_name,
    lastName: row.last_name,
    recoveryEmail: row.recovery_email,
    recoveryPhone: row.recovery_phone,
    isManager: flag(row.is_manager),
    isSuperuser: flag(row.is_superuser),
    isActive: flag(row.is_active),
    dateJoined: row.date_joined
  };
}

export function findUserRow(db: Db, id: number): UserRow | undefined {
  return db.prepare<unknown[], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
}

export function findUserRowByUsername(db: Db, username: string): UserRow | undefined {
  return db
    .prepare<unknown[], UserRow>('SELECT * FROM users WHERE username = ? COLLATE NOCASE')
    .get(username.trim());
}

export function usernameTaken(db: Db, username: string, exceptId?: number): boolean {
  const row = db
    .prepare<unknown[], { id: number }>('SELECT id FROM users WHERE username = ? COLLATE NOCASE')
    .get(username.trim());
  return row !== undefined && row.id !== exceptId;
}

export function isManagerUser(user: Pick<User, 'isManager' | 'isSuperuser'>): boolean {
  return user.isSuperuser || user.isManager;
}

export interface NewUser {
  companyId: number | null;
  username: string;
  email?: string;
  password: string;
  firstName?: string;
  lastName?: string;
  recoveryEmail?: string;
  recoveryPhone?: string;
  isManager?: boolean;
  isSuperuser?: boolean;
  isActive?: boolean;
}

export function insertUser(db: Db, input: NewUser): User {
  const info = db
    .prepare(
      `INSERT INTO users (company_id, username, email, password_hash, first_name, last_name,
         recovery_email, recovery_phone, is_manager, is_superuser, is_active, date_joined)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      input.companyId,
      input.username.trim(),
      input.email ?? '',
      hashPassword(input.password),
      input.firstName ?? '',
      input.lastName ?? '',
      input.recoveryEmail ?? '',
      input.recoveryPhone ?? '',
      bit(input.isManager ?? false),
      bit(input.isSuperuser ?? false),
      bit(input.isActive ?? true),
      nowIso()
    );
  const row = findUserRow(db, Number(info.lastInsertRowid));
  if (!row) throw new Error('user insert did not persist');
  return toUser(row);
}

export function setPassword(db: Db, userId: number, password: string): void {
  db.prepare('UPDATE users SET password_hash = ? WHERE id = ?').run(hashPassword(password), userId);
}

/** Minimum length and not entirely numeric. Returns the failure message, or null. */
export function checkPasswordStrength(password: string): string | null {
  if (password.length < 8) {
    return 'Esta senha é muito curta. Ela precisa conter pelo menos 8 caracteres.';
  }
  if (/^\d+$/.test(password)) return 'Esta senha é inteiramente numérica.';
  return null;
}

/** Both fields, equal, strong enough. `required` false lets two blanks through. */
export function checkPasswordPair(
  password1: string,
  password2: string,
  required: boolean
): Result<string> {
  if (!required && !password1 && !password2) return ok('');
  if (!password1 || !password2) return err('VALIDATION_ERROR', 'Informe a senha duas vezes.');
  if (password1 !== password2) return err('VALIDATION_ERROR', 'As senhas não conferem.');
  const weak = checkPasswordStrength(password1);
  if (weak) return err('VALIDATION_ERROR', weak);
  return ok(password1);
}

export interface UserUsage {
  userLimit: number;
  managerLimit: number;
  activeUsers: number;
  activeManagers: number;
}

export function userUsage(db: Db, actor: TenantActor): UserUsage {
  const counts = db
    .prepare<unknown[], { users: number; managers: number | null }>(
      `SELECT COUNT(*) AS users, SUM(is_manager) AS managers
       FROM users WHERE company_id = ? AND is_active = 1`
    )
    .get(actor.company.id);
  return {
    userLimit: userLimit(actor.company),
    managerLimit: managerLimit(actor.company),
    activeUsers: counts?.users ?? 0,
    activeManagers: counts?.managers ?? 0
  };
}

const USER_LIMIT_MESSAGE =
  'Limite de usuarios ativos atingido. Considere o plano PLUS para aumentar o limite.';
const MANAGER_LIMIT_MESSAGE =
  'Limite de gerentes atingido. Considere o plano PLUS para aumentar o limite.';
const CANNOT_DEACTIVATE_SELF = 'Nao e possivel desativar o proprio usuario.';

// Seat limits apply only when a save turns a seat on
function checkSeatLimits(
  db: Db,
  actor: TenantActor,
  data: Pick<UserData, 'isActive' | 'isManager'>,
  previous: User | null
): Result<true> {
  if (!data.isActive) return ok(true);
  const usage = userUsage(db, actor);

  if (!previous || !previous.isActive) {
    if (usage.activeUsers >= usage.userLimit) return err('USER_LIMIT_REACHED', USER_LIMIT_MESSAGE);
  }
  if (data.isManager && (!previous || !previous.isManager || !previous.isActive)) {
    if (usage.activeManagers >= usage.managerLimit) {
      return err('MANAGER_LIMIT_REACHED', MANAGER_LIMIT_MESSAGE);
    }
  }
  return ok(true);
}

function parseUserInput(actor: TenantActor, input: unknown, previous: User | null): Result<UserData> {
  const parsed = validate(UserSchema, input);
  if (!parsed.ok) return parsed;
  // Extra managers are a PLUS feature; off PLUS the stored flag stays as it is
  const isManager = actor.company.plan === 'PLUS' ? parsed.data.isManager : (previous?.isManager ?? false);
  return ok({ ...parsed.data, isManager });
}

function findCompanyUser(db: Db, actor: TenantActor, id: number): User | null {
  const row = findUserRow(db, id);
  if (!row || row.company_id !== actor.company.id) return null;
  return toUser(row);
}

// Service functions:
// LIST company users, with seat usage
export function listUsers(
  db: Db,
  actor: TenantActor,
  query: { q?: unknown; page?: unknown }
): Page<User> & { usage: UserUsage } {
  const page = pageNumber(query.page);
  const pattern = likePattern(query.q);
  const where = pattern
    ? `WHERE company_id = ? AND (username LIKE ? ESCAPE '\\' OR email LIKE ? ESCAPE '\\'
        OR first_name LIKE ? ESCAPE '\\' OR last_name LIKE ? ESCAPE '\\')`
    : 'WHERE company_id = ?';
  const params: unknown[] = pattern
    ? [actor.company.id, pattern, pattern, pattern, pattern]
    : [actor.company.id];

  const total = db.prepare<unknown[], { n: number }>(`SELECT COUNT(*) AS n FROM users ${where}`).get(...params);
  const rows = db
    .prepare<unknown[], UserRow>(
      `SELECT * FROM users ${where} ORDER BY username COLLATE NOCASE LIMIT ${PAGE_SIZE} OFFSET ?`
    )
    .all(...params, offsetOf(page));

  return { ...toPage(rows.map(toUser), total?.n ?? 0, page), usage: userUsage(db, actor) };
}

// CREATE a user in the caller's company
export function createUser(db: Db, actor: TenantActor, input: unknown): Result<User> {
  const parsed = parseUserInput(actor, input, null);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const password = checkPasswordPair(data.password1, data.password2, true);
  if (!password.ok) return password;
  if (usernameTaken(db, data.username)) {
    return err('DUPLICATE_USERNAME', 'Este login já está em uso.');
  }
  const limits = checkSeatLimits(db, actor, data, null);
  if (!limits.ok) return limits;

  return ok(
    insertUser(db, {
      companyId: actor.company.id,
      username: data.username,
      email: data.email,
      password: password.data,
      firstName: data.firstName,
      lastName: data.lastName,
      recoveryEmail: data.recoveryEmail,
      recoveryPhone: data.recoveryPhone,
      isManager: data.isManager,
      isActive: data.isActive
    })
  );
}

// UPDATE a user; the password changes only when both fields are sent
export function updateUser(db: Db, actor: TenantActor, id: number, input: unknown): Result<User> {
  const previous = findCompanyUser(db, actor, id);
  if (!previous) return err('USER_NOT_FOUND', 'Usuário não encontrado.');

  const parsed = parseUserInput(actor, input, previous);
  if (!parsed.ok) return parsed;
  const data = parsed.data;
  if (id === actor.user.id && previous.isActive && !data.isActive) {
    return err('CANNOT_DEACTIVATE_SELF', CANNOT_DEACTIVATE_SELF);
  }

  const password = checkPasswordPair(data.password1, data.password2, false);
  if (!password.ok) return password;
  if (usernameTaken(db, data.username, id)) {
    return err('DUPLICATE_USERNAME', 'Este login já está em uso.');
  }
  const limits = checkSeatLimits(db, actor, data, previous);
  if (!limits.ok) return limits;

  db.transaction(() => {
    db.prepare(
      `UPDATE users SET username = ?, email = ?, first_name = ?, last_name = ?, recovery_email = ?,
         recovery_phone = ?, is_manager = ?, is_active = ?
       WHERE id = ?`
    ).run(
      data.username,
      data.email,
      data.firstName,
      data.lastName,
      data.recoveryEmail,
      data.recoveryPhone,
      bit(data.isManager),
      bit(data.isActive),
      id
    );
    if (password.data) setPassword(db, id, password.data);
  })();

  const row = findUserRow(db, id);
  return row ? ok(toUser(row)) : err('USER_NOT_FOUND', 'Usuário não encontrado.');
}

// DEACTIVATE a user (never the caller)
export function deactivateUser(db: Db, actor: TenantActor, id: number): Result<User> {
  const row = findUserRow(db, id);
  if (!row) return err('USER_NOT_FOUND', 'Usuário não encontrado.');
  if (row.company_id !== actor.company.id) {
    return err('FORBIDDEN', 'Usuário de outra empresa.');
  }
  if (row.id === actor.user.id) {
    return err('CANNOT_DEACTIVATE_SELF', CANNOT_DEACTIVATE_SELF);
  }

  db.prepare('UPDATE users SET is_active = 0 WHERE id = ?').run(id);
  return ok({ ...toUser(row), isActive: false });
}
