import { loadConfig } from '../config';
import { openDatabase } from '../db/database';
import logger from '../modules/logger';
import { DEMO_PASSWORD, DEMO_USERNAME, seedDemo } from '../services/seedService';
import { setTimeZone } from '../utils/dates';

const main = () => {
  const config = loadConfig();
  setTimeZone(config.timeZone);
  const db = openDatabase(config.databaseUrl);
  try {
    seedDemo(db);
    logger.info(`Dados de demonstração criados. Usuário: ${DEMO_USERNAME} / Senha: ${DEMO_PASSWORD}`);
  } finally {
    db.close();
  }
};

try {
  main();
} catch (e) {
  logger.error('seed failed', e);
  process.exitCode = 1;
}
