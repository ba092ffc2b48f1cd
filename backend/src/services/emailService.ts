import { createLogger } from '../modules/logger';

const log = createLogger('email');

export const RESEND_ENDPOINT = 'https://api.resend.com/emails';

export interface EmailMessage {
  to: string;
  subject: string;
  html: string;
  replyTo?: string;
  from?: string;
}

export interface SendOutcome {
  ok: boolean;
  detail: string | null;
  status: number | null;
}

/** Outbound email. The HTTP app only ever sees this interface. */
export interface Mailer {
  readonly configured: boolean;
  send(message: EmailMessage): Promise<SendOutcome>;
}

export interface ResendSettings {
  apiKey: string;
  from: string;
  debug: boolean;
  testFrom: string;
  allowTestFallback: boolean;
}

type FetchLike = typeof fetch;

// Only a prefix and the length of the key ever reach the logs
const keyInfo = (apiKey: string) => ({ keyPrefix: apiKey.slice(0, 6), keyLength: apiKey.length });

async function errorDetail(response: Response): Promise<string | null> {
  const text = await response.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof body !== 'object' || body === null) return null;

  const name: unknown = Reflect.get(body, 'name');
  const message: unknown = Reflect.get(body, 'message') || Reflect.get(body, 'error');
  if (typeof message !== 'string' || !message) return null;
  return typeof name === 'string' && name ? `${name}: ${message}` : message;
}

async function post(
  fetchImpl: FetchLike,
  apiKey: string,
  from: string,
  message: EmailMessage
): Promise<SendOutcome> {
  const payload: Record<string, unknown> = {
    from,
    to: [message.to],
    subject: message.subject,
    html: message.html
  };
  if (message.replyTo) payload.reply_to = message.replyTo;

  log.info('resend send attempt', {
    from,
    to: message.to,
    replyTo: message.replyTo ?? '-',
    subject: message.subject,
    ...keyInfo(apiKey)
  });

  let response: Response;
  try {
    response = await fetchImpl(RESEND_ENDPOINT, {
      method: 'POST',
      headers: { Authorization: `Bearer ${apiKey}`, 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
      signal: AbortSignal.timeout(20_000)
    });
  } catch (e) {
    log.error('resend request failed', e);
    return { ok: false, detail: 'Erro de comunicacao com o servico de email.', status: null };
  }

  if (response.status >= 400) {
    const detail = await errorDetail(response);
    log.error('resend email failed', { status: response.status, detail, from, to: message.to });
    return { ok: false, detail: detail ?? `HTTP ${response.status}`, status: response.status };
  }

  log.info('resend email sent', { status: response.status });
  return { ok: true, detail: null, status: response.status };
}

/**
 * Resend HTTP client. A 403 (unverified sender domain) is retried once from the
 * test sender when running in DEBUG or when the fallback is explicitly allowed.
 */
export function createResendMailer(settings: ResendSettings, fetchImpl: FetchLike = fetch): Mailer {
  const apiKey = settings.apiKey.trim();

  return {
    configured: apiKey !== '',
    async send(message) {
      const from = (message.from ?? settings.from).trim();
      if (!apiKey || !from) {
        log.error('resend config missing: RESEND_API_KEY or EMAIL_FROM not set');
        return { ok: false, detail: 'RESEND_API_KEY ou EMAIL_FROM nao configurados.', status: null };
      }

      const outcome = await post(fetchImpl, apiKey, from, message);
      const fallbackAllowed = settings.debug || settings.allowTestFallback;
      const testFrom = settings.testFrom.trim();
      if (outcome.status === 403 && fallbackAllowed && testFrom && testFrom !== from) {
        return post(fetchImpl, apiKey, testFrom, message);
      }
      return outcome;
    }
  };
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;'
};

/** Plain multi-line text as an HTML fragment. */
export function textToHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch).replace(/\n/g, '<br>');
}
