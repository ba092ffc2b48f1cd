import { createApp } from './app';
import { ConfigError, loadConfig } from './config';
import { openDatabase } from './db/database';
import logger from './modules/logger';
import { createResendMailer } from './services/emailService';

process.on('uncaughtException', (e) => logger.error('uncaughtException', e));
process.on('unhandledRejection', (reason) => logger.error('unhandledRejection', reason));

const boot = async () => {
  const config = loadConfig();
  await logger.init(config.logFile);

  const db = openDatabase(config.databaseUrl);
  const mailer = createResendMailer({
    apiKey: config.resendApiKey,
    from: config.emailFrom,
    debug: config.debug,
    testFrom: config.resendTestFromEmail,
    allowTestFallback: config.resendAllowTestFallback
  });
  if (!mailer.configured) logger.warn('RESEND_API_KEY not set; emails are disabled');

  const app = createApp({ db, config, mailer });
  const server = app.listen(config.port, () => {
    logger.info(`API listening on http://localhost:${config.port}`, { debug: config.debug });
  });

  const shutdown = () => {
    server.close(() => {
      db.close();
      process.exit(0);
    });
  };
  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
};

// Boot
boot().catch((e: unknown) => {
  logger.error(e instanceof ConfigError ? e.message : 'boot failed', e);
  process.exitCode = 1;
});
