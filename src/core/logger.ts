/**
 * Logging utility with module prefixing and a minimum level
 */

import { CONFIG } from '../config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_PRIORITY, value);
}

/**
 * Minimum level from LANGID_LOG_LEVEL, falling back to CONFIG.logging.level.
 * Read on every call so tests and long-running hosts can change it.
 */
export function getMinLevel(): LogLevel {
  const env = (process.env.LANGID_LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(env) ? env : CONFIG.logging.level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
}

export function createLogger(module: string): Logger {
  const prefix = `[${module}]`;
  return {
    debug: (msg, ...args) => {
      if (enabled('debug')) console.log(prefix, msg, ...args);
    },
    info: (msg, ...args) => {
      if (enabled('info')) console.log(prefix, msg, ...args);
    },
    warn: (msg, ...args) => {
      if (enabled('warn')) console.warn(prefix, msg, ...args);
    },
    error: (msg, ...args) => {
      if (enabled('error')) console.error(prefix, msg, ...args);
    },
  };
}
