import { config } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export function isLogLevel(value: string): value is LogLevel {
  return value in rank;
}

export interface Logger {
  debug(msg: string, ...extra: unknown[]): void;
  info(msg: string, ...extra: unknown[]): void;
  warn(msg: string, ...extra: unknown[]): void;
  error(msg: string, ...extra: unknown[]): void;
}

let threshold: LogLevel = isLogLevel(config.logLevel) ? config.logLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function createLogger(scope: string): Logger {
  const emit = (level: LogLevel, msg: string, extra: unknown[]) => {
    if (rank[level] < rank[threshold]) return;
    const line = `${new Date().toISOString()} [${scope}] ${level.toUpperCase()} ${msg}`;
    // eslint-disable-next-line no-console
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log;
    sink(line, ...extra);
  };
  return {
    debug: (msg, ...extra) => emit('debug', msg, extra),
    info: (msg, ...extra) => emit('info', msg, extra),
    warn: (msg, ...extra) => emit('warn', msg, extra),
    error: (msg, ...extra) => emit('error', msg, extra)
  };
}
