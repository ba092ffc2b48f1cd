import { Server } from 'node:http';
import { createApp } from '../app';
import { Db } from '../db/database';
import { FakeMailer, freshDb, seedTenant, seedUser, TEST_PASSWORD, testConfig } from './__mocks__/fixtures';

interface Running {
  url: string;
  server: Server;
}

function start(db: Db, overrides: Record<string, unknown> = {}): Promise<Running> {
  const app = createApp({ db, config: testConfig(overrides), mailer: new FakeMailer(false) });
  return new Promise((resolve) => {
    const server = app.listen(0, '127.0.0.1', () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      resolve({ url: `http://127.0.0.1:${port}`, server });
    });
  });
}

const stop = (running: Running) => new Promise<void>((resolve) => running.server.close(() => resolve()));

const field = (body: unknown, key: string): unknown =>
  typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;

interface CallOptions {
  method?: string;
  body?: string;
  contentType?: string;
}

describe('HTTP API', () => {
  let db: Db;
  let api: Running;
  let managerName = '';

  beforeAll(async () => {
    db = freshDb();
    const { company, manager } = seedTenant(db);
    managerName = manager.username;
    seedUser(db, company, { username: 'mecanico' });
    api = await start(db);
  });

  afterAll(async () => {
    await stop(api);
    db.close();
  });

  const call = (path: string, options: CallOptions = {}, token?: string) => {
    const headers: Record<string, string> = { 'Content-Type': options.contentType ?? 'application/json' };
    if (token) headers.Authorization = `Bearer ${token}`;
    return fetch(`${api.url}${path}`, { method: options.method ?? 'GET', body: options.body, headers });
  };

  async function tokenFor(username: string): Promise<string> {
    const res = await call('/api/auth/login', {
      method: 'POST',
      body: JSON.stringify({ username, password: TEST_PASSWORD })
    });
    return String(field(await res.json(), 'token'));
  }

  test('health check', async () => {
    const res = await call('/health');
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  test('tenant routes need a token', async () => {
    const res = await call('/api/clients');
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: 'UNAUTHENTICATED', message: 'Autenticação necessária.' } });
  });

  test('wrong password is a 401', async () => {
    const res = await call('/api/auth/login', {
      method: 'POST',
      body: JSON.stringify({ username: 'mecanico', password: 'errada-123' })
    });
    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: { code: 'INVALID_CREDENTIALS', message: 'Usuário ou senha inválidos.' } });
  });

  test('a manager creates and lists clients', async () => {
    const token = await tokenFor(managerName);

    const created = await call(
      '/api/clients',
      { method: 'POST', body: JSON.stringify({ name: 'ana souza', phone: '11 90000-0000' }) },
      token
    );
    expect(created.status).toBe(201);
    expect(field(await created.json(), 'name')).toBe('ANA SOUZA');

    const list = await call('/api/clients?q=souza', {}, token);
    expect(field(await list.json(), 'total')).toBe(1);
  });

  test('staff cannot reach manager routes', async () => {
    const token = await tokenFor('mecanico');

    const cash = await call('/api/cash', {}, token);
    expect(cash.status).toBe(403);
    expect(await cash.json()).toEqual({
      error: { code: 'MANAGER_REQUIRED', message: 'Acesso restrito ao gerente da empresa.' }
    });
  });

  test('products go in and out as CSV', async () => {
    const token = await tokenFor(managerName);

    const imported = await call(
      '/api/products/import',
      { method: 'POST', body: 'Vela,,V1,,12.9,4\n', contentType: 'text/csv' },
      token
    );
    expect(imported.status).toBe(200);
    expect(await imported.json()).toEqual({
      created: 1,
      updated: 0,
      message: '1 produto(s) importado(s), 0 atualizado(s) com sucesso.'
    });

    const exported = await call('/api/products/export', {}, token);
    expect(exported.headers.get('content-type')).toBe('text/csv; charset=utf-8');
    expect(exported.headers.get('content-disposition')).toBe('attachment; filename="produtos.csv"');
    const bytes = Buffer.from(await exported.arrayBuffer());
    expect([...bytes.subarray(0, 3)]).toEqual([0xef, 0xbb, 0xbf]);
    expect(bytes.subarray(3).toString('utf8')).toBe('Nome,Descrição,Código,Custo,Preço,Estoque\r\nVela,,V1,,12.9,4\r\n');
  });

  test('malformed JSON is a validation error', async () => {
    const res = await call('/api/auth/login', { method: 'POST', body: '{"username":' });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: { code: 'VALIDATION_ERROR', message: 'JSON inválido.' } });
  });

  test('unknown API paths are a 404', async () => {
    const res = await call('/api/nada');
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Recurso não encontrado.' } });
  });

  test('support contact without an email provider is a 503', async () => {
    const res = await call('/api/support/contact', {
      method: 'POST',
      body: JSON.stringify({ nome: 'João', email: 'joao@example.test', mensagem: 'Ajuda' })
    });
    expect(res.status).toBe(503);
  });
});

describe('host allowlist', () => {
  test('requests for other hosts are refused', async () => {
    const db = freshDb();
    const running = await start(db, { ALLOWED_HOSTS: 'oficina.test' });
    try {
      const res = await fetch(`${running.url}/health`);
      expect(res.status).toBe(400);
      expect(await res.text()).toBe('Bad Request (Host)');
    } finally {
      await stop(running);
      db.close();
    }
  });
});
