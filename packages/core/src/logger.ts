import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Console logger gated by level.
 *
 * @param level - Most verbose level that is printed
 * @param prefix - Tag printed before every line
 */
export function createDefaultLogger(level: LogLevel = 'info', prefix = 'POLYSTORE'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[${prefix} ERROR] ${msg}`, meta ?? '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[${prefix} WARN] ${msg}`, meta ?? '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[${prefix} INFO] ${msg}`, meta ?? '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[${prefix} DEBUG] ${msg}`, meta ?? '');
    },
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
