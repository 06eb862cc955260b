import type { Logger, LogLevel } from './types.js';
import { LOG_LEVELS } from './types.js';

/**
 * Create default console logger
 *
 * Messages above the configured level are dropped. Meta objects are passed to
 * console untouched so they print with Node's inspector formatting.
 */
export function createConsoleLogger(level: LogLevel = 'info', prefix = 'PIPEGEN'): Logger {
  const currentLevel = LOG_LEVELS.indexOf(level);

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
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
