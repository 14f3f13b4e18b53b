/**
 * Structured logger with categories and levels.
 * Initial threshold comes from the LOG_LEVEL env var; runtime config may override it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LOG_PRIORITY, value);
}

function initialLevel(): LogLevel {
  const fromEnv = typeof process !== 'undefined' ? process.env.LOG_LEVEL : undefined;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

let globalLevel: LogLevel = initialLevel();

export function setLogLevel(level: LogLevel): void {
  globalLevel = level;
}

export function getLogLevel(): LogLevel {
  return globalLevel;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  /** Logger for a sub-category, prefixed `[parent:child]`. */
  child(category: string): Logger;
}

export function createLogger(category: string): Logger {
  const prefix = `[${category}]`;

  function shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITY[level] >= LOG_PRIORITY[globalLevel];
  }

  return {
    debug(...args: unknown[]): void {
      if (shouldLog('debug')) console.debug(prefix, ...args);
    },
    info(...args: unknown[]): void {
      if (shouldLog('info')) console.info(prefix, ...args);
    },
    warn(...args: unknown[]): void {
      if (shouldLog('warn')) console.warn(prefix, ...args);
    },
    error(...args: unknown[]): void {
      if (shouldLog('error')) console.error(prefix, ...args);
    },
    child(sub: string): Logger {
      return createLogger(`${category}:${sub}`);
    },
  };
}
