/**
 * Leveled console logger for server code.
 * Callers prefix their messages with a bracketed scope, e.g. `[Dataset]`.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let activeLevel: LogLevel = process.env.DEBUG === 'true' ? 'debug' : 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[activeLevel];
}

function timestamp(): string {
  return new Date().toISOString();
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    if (enabled('debug')) console.debug(`${timestamp()} DEBUG ${message}`, ...args);
  },
  info(message: string, ...args: unknown[]): void {
    if (enabled('info')) console.info(`${timestamp()} INFO ${message}`, ...args);
  },
  warn(message: string, ...args: unknown[]): void {
    if (enabled('warn')) console.warn(`${timestamp()} WARN ${message}`, ...args);
  },
  error(message: string, ...args: unknown[]): void {
    if (enabled('error')) console.error(`${timestamp()} ERROR ${message}`, ...args);
  },
};
