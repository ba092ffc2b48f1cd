import { existsSync } from 'node:fs';
import fs from 'node:fs/promises';
import process from 'node:process';

import signale from 'signale';

export interface Logger {
  info: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  init: (filename?: string) => Promise<void>;
}

const formatArg = (arg: unknown): string => {
  if (arg instanceof Error) {
    const cause = arg.cause ? ` (cause: ${String(arg.cause)})` : '';
    return `${arg.name}: ${arg.message}${cause}\n${arg.stack ?? ''}`;
  }
  if (typeof arg === 'object') {
    return JSON.stringify(arg);
  }
  return String(arg);
};

// Shared by every scoped logger; empty until init() names a file
let filename = '';

export const createLogger = (scope: string): Logger => {
  const out = new signale.Signale({
    scope,
    disabled: process.env.NODE_ENV === 'test',
  });

  const appendLog = (...args: unknown[]) => {
    if (!filename) return;
    fs.appendFile(
      `${filename}.log`,
      `${new Date().toISOString()} ${args.map(formatArg).join(' ')}\n`
    ).catch((e: unknown) => out.error('log append failed', e));
  };

  const info = (...args: unknown[]) => {
    appendLog(...args);
    out.info(...args);
  };

  const error = (...args: unknown[]) => {
    appendLog(...args);
    out.error(...args);
  };

  const warn = (...args: unknown[]) => {
    appendLog(...args);
    out.warn(...args);
  };

  // Keeps the two previous runs as <name>.1.log and <name>.2.log
  const init = async (newFilename: string = '') => {
    filename = newFilename;
    if (!filename) return;

    if (existsSync(`${filename}.log`)) {
      if (existsSync(`${filename}.1.log`)) {
        await fs.copyFile(`${filename}.1.log`, `${filename}.2.log`);
      }
      await fs.copyFile(`${filename}.log`, `${filename}.1.log`);
    }

    await fs.writeFile(
      `${filename}.log`,
      `${new Date().toISOString()} Log file created at ${new Date()}. OS: ${process.platform}\n`
    );
  };

  return { info, error, warn, init };
};

const logger = createLogger('oficina');

export default logger;
