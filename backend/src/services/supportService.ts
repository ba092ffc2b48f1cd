import { Result } from '../models/structures';
import { createLogger } from '../modules/logger';
import { Mailer, textToHtml } from './emailService';
import { err, ok } from './common';

const log = createLogger('support');

const field = (value: unknown): string => (typeof value === 'string' ? value.trim() : '');

// SEND a help request from the login screen to the support inbox
export async function sendSupportContact(
  mailer: Mailer,
  contactEmail: string,
  input: { nome?: unknown; email?: unknown; mensagem?: unknown }
): Promise<Result<{ ok: true }>> {
  const name = field(input.nome);
  const email = field(input.email);
  const message = field(input.mensagem);
  if (!name || !email || !message) return err('VALIDATION_ERROR', 'Preencha nome, email e mensagem.');

  if (!mailer.configured) {
    return err('EMAIL_NOT_CONFIGURED', 'Serviço de email não configurado. Informe o suporte.');
  }

  const body = `Solicitação de ajuda no login:\n\nNome: ${name}\nEmail: ${email}\nMensagem:\n${message}`;
  const outcome = await mailer.send({
    to: contactEmail,
    subject: 'Ajuda no acesso - Oficina',
    html: textToHtml(body),
    replyTo: email
  });
  if (!outcome.ok) {
    log.warn('support contact not sent', { detail: outcome.detail });
    return err('EMAIL_SEND_FAILED', outcome.detail || 'Erro ao enviar email.');
  }
  return ok({ ok: true });
}
