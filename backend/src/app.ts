import express, { ErrorRequestHandler, Express, RequestHandler } from 'express';
import cors from 'cors';
import { authenticate, requireManager, requireSuperuser, requireTenant } from './middleware/auth';
import { createLogger } from './modules/logger';
import { createAdminRouter } from './routes (APIs)/admin';
import { createAppointmentsRouter } from './routes (APIs)/appointments';
import { createAuthRouter } from './routes (APIs)/auth';
import { createClientsRouter } from './routes (APIs)/clients';
import { createCompanyRouter, createPlansRouter } from './routes (APIs)/company';
import { createEmployeesRouter } from './routes (APIs)/employees';
import { createCashRouter, createDashboardRouter, createReportsRouter } from './routes (APIs)/finance';
import { AppContext } from './routes (APIs)/http';
import { createProductsRouter } from './routes (APIs)/products';
import { createServiceOrdersRouter } from './routes (APIs)/serviceOrders';
import { createSupportRouter } from './routes (APIs)/support';
import { createUsersRouter } from './routes (APIs)/users';
import { createVehiclesRouter } from './routes (APIs)/vehicles';
import { setTimeZone } from './utils/dates';

export type { AppContext } from './routes (APIs)/http';

const log = createLogger('http');

const BODY_LIMIT = '5mb';

// Helpers:
const requestLog: RequestHandler = (req, res, next) => {
  const started = process.hrtime.bigint();
  res.on('finish', () => {
    const ms = Number(process.hrtime.bigint() - started) / 1e6;
    log.info(`${req.method} ${req.originalUrl} ${res.statusCode}`, { ms: Math.round(ms) });
  });
  next();
};

function hostCheck(allowedHosts: string[]): RequestHandler {
  const anyHost = allowedHosts.includes('*');
  const allowed = new Set(allowedHosts.map((host) => host.toLowerCase()));
  return (req, res, next) => {
    const host = (req.headers.host ?? '').replace(/:\d+$/, '').toLowerCase();
    if (anyHost || allowed.has(host)) return next();
    log.warn('host rejected', { host });
    res.status(400).type('text/plain').send('Bad Request (Host)');
  };
}

function corsOptions(trustedOrigins: string[], debug: boolean): cors.CorsOptions {
  return {
    origin: (origin, callback) => {
      callback(null, !origin || debug || trustedOrigins.includes(origin));
    }
  };
}

const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, next) => {
  if (res.headersSent) return next(error);

  const type: unknown = typeof error === 'object' && error !== null ? Reflect.get(error, 'type') : undefined;
  if (type === 'entity.parse.failed') {
    res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'JSON inválido.' } });
    return;
  }
  if (type === 'entity.too.large') {
    res.status(413).json({ error: { code: 'VALIDATION_ERROR', message: 'Conteúdo muito grande.' } });
    return;
  }

  log.error('unexpected error', error);
  res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Erro interno do servidor.' } });
};

export function createApp(ctx: AppContext): Express {
  setTimeZone(ctx.config.timeZone);
  const app = express();
  app.disable('x-powered-by');

  // Middlewares
  app.use(requestLog);
  app.use(hostCheck(ctx.config.allowedHosts));
  app.use(cors(corsOptions(ctx.config.trustedOrigins, ctx.config.debug)));
  app.use(express.json({ limit: BODY_LIMIT }));
  app.use(express.text({ type: 'text/csv', limit: BODY_LIMIT }));

  // Healthcheck
  app.get('/health', (_req, res) => res.json({ ok: true }));

  // Public routes
  app.use('/api/auth', createAuthRouter(ctx));
  app.use('/api/support', createSupportRouter(ctx));

  // Authenticated routes
  const auth = authenticate(ctx);
  app.use('/api/admin', auth, requireSuperuser, createAdminRouter(ctx));
  app.use('/api/plans', auth, createPlansRouter(ctx));
  app.use('/api/company', auth, requireTenant, createCompanyRouter(ctx));
  app.use('/api/users', auth, requireTenant, createUsersRouter(ctx));
  app.use('/api/employees', auth, requireTenant, createEmployeesRouter(ctx));
  app.use('/api/clients', auth, requireTenant, createClientsRouter(ctx));
  app.use('/api/vehicles', auth, requireTenant, createVehiclesRouter(ctx));
  app.use('/api/appointments', auth, requireTenant, createAppointmentsRouter(ctx));
  app.use('/api/products', auth, requireTenant, createProductsRouter(ctx));
  app.use('/api/service-orders', auth, requireTenant, createServiceOrdersRouter(ctx));
  app.use('/api/cash', auth, requireTenant, requireManager, createCashRouter(ctx));
  app.use('/api/reports', auth, requireTenant, requireManager, createReportsRouter(ctx));
  app.use('/api/dashboard', auth, requireTenant, createDashboardRouter(ctx));

  app.use('/api', (_req, res) => {
    res.status(404).json({ error: { code: 'NOT_FOUND', message: 'Recurso não encontrado.' } });
  });
  app.use(errorHandler);

  return app;
}
