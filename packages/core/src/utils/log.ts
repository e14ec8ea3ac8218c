/* eslint-disable no-console */
export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface Logger {
  error(scope: string, message: string): void;
  warn(scope: string, message: string): void;
  info(scope: string, message: string): void;
  debug(scope: string, message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export const LOG_LEVEL_ENV = 'METATILE_LOG';

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'warn'): LogLevel {
  const v = (value ?? '').trim().toLowerCase();
  if (v === 'error' || v === 'warn' || v === 'info' || v === 'debug') return v;
  return fallback;
}

// Scope-tagged console lines, e.g. "[tileset] metatile 12: tile 900 out of range".
export function createConsoleLogger(level: LogLevel = parseLogLevel(process.env[LOG_LEVEL_ENV])): Logger {
  const max = LEVEL_RANK[level];
  const enabled = (l: LogLevel) => LEVEL_RANK[l] <= max;
  return {
    error: (scope, message) => { if (enabled('error')) console.error(`[${scope}] ${message}`); },
    warn: (scope, message) => { if (enabled('warn')) console.warn(`[${scope}] ${message}`); },
    info: (scope, message) => { if (enabled('info')) console.log(`[${scope}] ${message}`); },
    debug: (scope, message) => { if (enabled('debug')) console.debug(`[${scope}] ${message}`); },
  };
}

export const defaultLogger: Logger = createConsoleLogger();
