/**
 * Levelled console logging shared by every module.
 */

export enum LogLevel {
  NONE = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || 'info').toLowerCase()) {
    case 'none':
      return LogLevel.NONE;
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
      return LogLevel.DEBUG;
    default:
      throw new Error(`Unknown log level: ${value}`);
  }
}

let currentLogLevel = LogLevel.INFO;

export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

export interface Logger {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

/**
 * Returns a logger whose lines carry `[scope]` after the level tag, e.g.
 * `[WARN] [queue] Rejected deployment for repository 3`.
 */
export function createLogger(scope: string): Logger {
  const tag = `[${scope}]`;
  return {
    error: (...args) => {
      if (currentLogLevel >= LogLevel.ERROR) console.error('[ERROR]', tag, ...args);
    },
    warn: (...args) => {
      if (currentLogLevel >= LogLevel.WARN) console.warn('[WARN]', tag, ...args);
    },
    info: (...args) => {
      if (currentLogLevel >= LogLevel.INFO) console.log('[INFO]', tag, ...args);
    },
    debug: (...args) => {
      if (currentLogLevel >= LogLevel.DEBUG) console.log('[DEBUG]', tag, ...args);
    },
  };
}
