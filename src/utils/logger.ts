/**
 * Console-backed logger with a level threshold and per-component prefixes.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(component: string): Logger;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

export function createLogger(component?: string): Logger {
  const prefix = component ? `[${component}] ` : '';
  return {
    debug(message) {
      if (enabled('debug')) console.debug(`${prefix}${message}`);
    },
    info(message) {
      if (enabled('info')) console.log(`${prefix}${message}`);
    },
    warn(message) {
      if (enabled('warn')) console.warn(`${prefix}${message}`);
    },
    error(message) {
      if (enabled('error')) console.error(`${prefix}${message}`);
    },
    child(name) {
      return createLogger(component ? `${component}:${name}` : name);
    },
  };
}

export const logger = createLogger();
