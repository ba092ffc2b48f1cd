import { verifyPassword } from '../services/crypto';
import { requestPasswordRecovery, resetPassword, whatsappNumber } from '../services/recoveryService';
import { sendSupportContact } from '../services/supportService';
import { findUserRow } from '../services/userService';
import { FakeMailer, freshDb, seedCompany, seedUser, TEST_PASSWORD } from './__mocks__/fixtures';

const settings = { secretKey: 'test-secret', publicUrl: 'http://oficina.test' };

// uid and token out of the link in the last email
function linkParts(mailer: FakeMailer): { uid: string; token: string } {
  const last = mailer.sent[mailer.sent.length - 1];
  const match = /http:\/\/oficina\.test\/accounts\/reset\/([^/]+)\/([^/]+)\//.exec(last?.html ?? '');
  if (!match) throw new Error('no reset link sent');
  return { uid: match[1], token: match[2] };
}

describe('requestPasswordRecovery', () => {
  test('mails a working, single-use link to the account email', async () => {
    const db = freshDb();
    const user = seedUser(db, seedCompany(db), { username: 'ana', email: 'ana@example.test' });
    const mailer = new FakeMailer();

    const result = await requestPasswordRecovery(db, mailer, settings, { identificador: 'ANA@example.test' });
    expect(result).toEqual({ ok: true, data: { emailSent: true, whatsappLink: null } });
    expect(mailer.sent[0]).toMatchObject({
      to: 'ana@example.test',
      subject: 'Recuperacao de senha - SaaS Gestao de Oficina'
    });

    const { uid, token } = linkParts(mailer);
    const reset = { uid, token, password1: 'nova-senha-9', password2: 'nova-senha-9' };
    expect(resetPassword(db, 'test-secret', reset)).toEqual({ ok: true, data: { ok: true } });
    const row = findUserRow(db, user.id);
    expect(row && verifyPassword('nova-senha-9', row.password_hash)).toBe(true);

    const reused = resetPassword(db, 'test-secret', reset);
    expect(reused.ok).toBe(false);
    if (!reused.ok) expect(reused.error.message).toBe('Link de recuperação inválido ou expirado.');
  });

  test('a company phone lookup gives a WhatsApp link only', async () => {
    const db = freshDb();
    seedUser(db, seedCompany(db), { username: 'sem-email' });
    const mailer = new FakeMailer();

    const result = await requestPasswordRecovery(db, mailer, settings, { identificador: '(11) 3333-4444' });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.emailSent).toBe(false);
      expect(result.data.whatsappLink?.startsWith('https://wa.me/551133334444?text=')).toBe(true);
      const text = decodeURIComponent((result.data.whatsappLink ?? '').split('?text=')[1]);
      expect(text).toMatch(/^Recebemos sua solicitacao .* acesse: http:\/\/oficina\.test\/accounts\/reset\//);
    }
    expect(mailer.sent).toEqual([]);
  });

  test('recovery email and phone take precedence', async () => {
    const db = freshDb();
    seedUser(db, seedCompany(db), {
      username: 'ana',
      email: 'ana@example.test',
      recoveryEmail: 'ana.pessoal@example.test',
      recoveryPhone: '(21) 98888-7777'
    });
    const mailer = new FakeMailer();

    const result = await requestPasswordRecovery(db, mailer, settings, { identificador: '21988887777' });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.emailSent).toBe(true);
      expect(result.data.whatsappLink?.startsWith('https://wa.me/5521988887777?text=')).toBe(true);
    }
    expect(mailer.sent.map((m) => m.to)).toEqual(['ana.pessoal@example.test']);
  });

  test('unknown, blank and undeliverable requests fail', async () => {
    const db = freshDb();
    seedUser(db, seedCompany(db), { username: 'ana', email: 'ana@example.test' });
    const mailer = new FakeMailer();

    const blank = await requestPasswordRecovery(db, mailer, settings, { identificador: '  ' });
    if (!blank.ok) expect(blank.error.message).toBe('Informe e-mail ou telefone para recuperar a senha.');
    const unknown = await requestPasswordRecovery(db, mailer, settings, { identificador: 'x@example.test' });
    if (!unknown.ok) expect(unknown.error.code).toBe('ACCOUNT_NOT_FOUND');

    mailer.failWith = 'quota exceeded';
    const failed = await requestPasswordRecovery(db, mailer, settings, { identificador: 'ana@example.test' });
    if (!failed.ok) {
      expect(failed.error.code).toBe('EMAIL_SEND_FAILED');
      expect(failed.error.message).toBe('Nao foi possivel enviar o email de recuperacao. quota exceeded');
    }
    expect([blank.ok, unknown.ok, failed.ok]).toEqual([false, false, false]);
  });
});

describe('resetPassword', () => {
  test('rejects a forged link and keeps the password', () => {
    const db = freshDb();
    const user = seedUser(db, seedCompany(db), { username: 'ana' });

    const result = resetPassword(db, 'test-secret', {
      uid: 'bm9wZQ',
      token: 'abc-def',
      password1: 'nova-senha-9',
      password2: 'nova-senha-9'
    });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe('INVALID_RESET_TOKEN');
    const row = findUserRow(db, user.id);
    expect(row && verifyPassword(TEST_PASSWORD, row.password_hash)).toBe(true);
  });
});

describe('whatsappNumber', () => {
  test('adds the country code to local numbers', () => {
    expect(whatsappNumber('(11) 98888-7777')).toBe('5511988887777');
    expect(whatsappNumber('+55 11 98888-7777')).toBe('5511988887777');
    expect(whatsappNumber('123')).toBe('123');
  });
});

describe('sendSupportContact', () => {
  const input = { nome: 'João', email: 'joao@example.test', mensagem: 'Não consigo entrar' };

  test('sends to the support inbox with reply-to', async () => {
    const mailer = new FakeMailer();
    expect(await sendSupportContact(mailer, 'suporte@example.test', input)).toEqual({ ok: true, data: { ok: true } });
    expect(mailer.sent).toEqual([
      {
        to: 'suporte@example.test',
        subject: 'Ajuda no acesso - Oficina',
        html: 'Solicitação de ajuda no login:<br><br>Nome: João<br>Email: joao@example.test<br>Mensagem:<br>Não consigo entrar',
        replyTo: 'joao@example.test'
      }
    ]);
  });

  test('reports missing fields, missing configuration and send failures', async () => {
    const missing = await sendSupportContact(new FakeMailer(), 'suporte@example.test', { nome: 'João' });
    if (!missing.ok) expect(missing.error.message).toBe('Preencha nome, email e mensagem.');

    const unconfigured = await sendSupportContact(new FakeMailer(false), 'suporte@example.test', input);
    if (!unconfigured.ok) expect(unconfigured.error.code).toBe('EMAIL_NOT_CONFIGURED');

    const mailer = new FakeMailer();
    mailer.failWith = '';
    const failed = await sendSupportContact(mailer, 'suporte@example.test', input);
    if (!failed.ok) expect(failed.error).toEqual({ code: 'EMAIL_SEND_FAILED', message: 'Erro ao enviar email.' });

    expect([missing.ok, unconfigured.ok, failed.ok]).toEqual([false, false, false]);
  });
});
