/**
 * Minimal leveled logger.
 *
 * Every component gets its own prefixed logger via `createLogger('name')`.
 * Output goes to the matching `console` method so that test runners and
 * process managers pick it up without extra wiring. The threshold is global
 * and starts from `REWIND_LOG_LEVEL` (default: `info`).
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.REWIND_LOG_LEVEL;
let currentLevel: LogLevel = envLevel && isLogLevel(envLevel) ? envLevel : 'info';

/** Set the global log threshold. Messages below it are dropped. */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return SEVERITY[level] >= SEVERITY[currentLevel];
}

/**
 * Create a logger whose messages are prefixed with `[component]`.
 */
export function createLogger(component: string): Logger {
  const prefix = `[${component}]`;
  return {
    debug: (message, ...args) => {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info: (message, ...args) => {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn: (message, ...args) => {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error: (message, ...args) => {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}
