/**
 * Console logging with `[Component]` prefixes, gated by one process-wide
 * level. `debug` and `info` go to console.log, `warn` and `error` to their
 * console counterparts.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let currentLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug(message, ...details) {
      if (isLevelEnabled('debug')) {
        console.log(`${prefix} ${message}`, ...details);
      }
    },
    info(message, ...details) {
      if (isLevelEnabled('info')) {
        console.log(`${prefix} ${message}`, ...details);
      }
    },
    warn(message, ...details) {
      if (isLevelEnabled('warn')) {
        console.warn(`${prefix} ${message}`, ...details);
      }
    },
    error(message, ...details) {
      if (isLevelEnabled('error')) {
        console.error(`${prefix} ${message}`, ...details);
      }
    },
  };
}
