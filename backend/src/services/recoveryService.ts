import { Db } from '../db/database';
import { PasswordResetSchema } from '../models/schemas';
import { Result } from '../models/structures';
import { createLogger } from '../modules/logger';
import { onlyDigits } from '../utils/text';
import { checkResetToken, makeResetToken, resetUid, resetUserId } from './crypto';
import { Mailer, textToHtml } from './emailService';
import { checkPasswordPair, findUserRow, setPassword, UserRow } from './userService';
import { err, ok, validate } from './common';

const log = createLogger('recovery');

export interface RecoverySettings {
  secretKey: string;
  publicUrl: string;
}

export interface RecoveryOutcome {
  emailSent: boolean;
  whatsappLink: string | null;
}

type RecoveryRow = UserRow & { company_phone: string | null };

const RECOVERY_SELECT = `SELECT u.*, c.phone AS company_phone FROM users u
  LEFT JOIN companies c ON c.id = u.company_id`;

// Phones are stored as typed; compare their digits only
const digitsOf = (column: string): string =>
  ['(', ')', '-', ' ', '+', '.'].reduce((sql, ch) => `replace(${sql}, '${ch}', '')`, column);

// Lookup order: account email, recovery email; by phone: recovery phone, company phone
function findAccount(db: Db, identifier: string): RecoveryRow | undefined {
  const first = (where: string, value: string) =>
    db.prepare<unknown[], RecoveryRow>(`${RECOVERY_SELECT} WHERE ${where} ORDER BY u.id LIMIT 1`).get(value);

  if (identifier.includes('@')) {
    return (
      first('u.email = ? COLLATE NOCASE', identifier) ??
      first('u.recovery_email = ? COLLATE NOCASE', identifier)
    );
  }
  const digits = onlyDigits(identifier);
  if (!digits) return undefined;
  const pattern = `%${digits}%`;
  return (
    first(`${digitsOf('u.recovery_phone')} LIKE ?`, pattern) ?? first(`${digitsOf('c.phone')} LIKE ?`, pattern)
  );
}

/** wa.me wants the country code; 10 or 11 digit numbers are taken as Brazilian. */
export function whatsappNumber(phone: string): string {
  const digits = onlyDigits(phone);
  if ((digits.length === 10 || digits.length === 11) && !digits.startsWith('55')) return `55${digits}`;
  return digits;
}

export function resetLink(settings: RecoverySettings, row: Pick<UserRow, 'id' | 'password_hash'>): string {
  const token = makeResetToken(row.id, row.password_hash, settings.secretKey);
  return `${settings.publicUrl}/accounts/reset/${resetUid(row.id)}/${token}/`;
}

// REQUEST a reset link by email and, for phone lookups, a WhatsApp link
export async function requestPasswordRecovery(
  db: Db,
  mailer: Mailer,
  settings: RecoverySettings,
  input: { identificador?: unknown }
): Promise<Result<RecoveryOutcome>> {
  const identifier = typeof input.identificador === 'string' ? input.identificador.trim() : '';
  if (!identifier) {
    return err('VALIDATION_ERROR', 'Informe e-mail ou telefone para recuperar a senha.');
  }

  const row = findAccount(db, identifier);
  if (!row) return err('ACCOUNT_NOT_FOUND', 'Nenhuma conta encontrada com esse e-mail ou telefone.');

  const link = resetLink(settings, row);
  const destination = row.recovery_email || row.email;
  const phone = identifier.includes('@') ? '' : whatsappNumber(row.recovery_phone || row.company_phone || '');

  if (!destination && !phone) {
    return err('VALIDATION_ERROR', 'Nenhum e-mail ou telefone cadastrado para recuperar a senha.');
  }

  let emailSent = false;
  if (destination) {
    const body = [
      'Recebemos uma solicitacao de recuperacao de senha.',
      '',
      'Para definir uma nova senha, acesse o link abaixo:',
      link,
      '',
      'Se voce nao solicitou, ignore esta mensagem.'
    ].join('\n');
    const outcome = await mailer.send({
      to: destination,
      subject: 'Recuperacao de senha - SaaS Gestao de Oficina',
      html: textToHtml(body)
    });
    if (!outcome.ok) {
      log.warn('recovery email not sent', { userId: row.id, detail: outcome.detail });
      return err(
        'EMAIL_SEND_FAILED',
        `Nao foi possivel enviar o email de recuperacao. ${outcome.detail ?? ''}`.trim()
      );
    }
    emailSent = true;
  }

  let whatsappLink: string | null = null;
  if (phone) {
    const text = `Recebemos sua solicitacao de recuperacao de senha. Para definir uma nova senha, acesse: ${link}`;
    whatsappLink = `https://wa.me/${phone}?text=${encodeURIComponent(text)}`;
  }

  log.info('password recovery requested', { userId: row.id, emailSent, whatsapp: whatsappLink !== null });
  return ok({ emailSent, whatsappLink });
}

// RESET the password from a uid/token link
export function resetPassword(db: Db, secretKey: string, input: unknown): Result<{ ok: true }> {
  const parsed = validate(PasswordResetSchema, input);
  if (!parsed.ok) return parsed;
  const data = parsed.data;

  const userId = resetUserId(data.uid);
  const row = userId === null ? undefined : findUserRow(db, userId);
  if (!row || !checkResetToken(row.id, row.password_hash, data.token, secretKey)) {
    return err('INVALID_RESET_TOKEN', 'Link de recuperação inválido ou expirado.');
  }

  const password = checkPasswordPair(data.password1, data.password2, true);
  if (!password.ok) return password;

  setPassword(db, row.id, password.data);
  log.info('password reset', { userId: row.id });
  return ok({ ok: true });
}
