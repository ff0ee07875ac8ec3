/**
 * Structured Logger
 *
 * JSON-formatted logging with levels: debug, info, warn, error
 *
 * - The minimum level is set once at startup from config (configureLogger)
 * - Until then it falls back to info in production, debug elsewhere
 * - `logger.child({ component })` stamps fields onto every entry
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minLevel: LogLevel = process.env.NODE_ENV === 'production' ? 'info' : 'debug';

export function configureLogger(options: { level: LogLevel }): void {
  minLevel = options.level;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];
}

function formatEntry(level: LogLevel, message: string, context?: LogContext) {
  const entry: LogContext = {
    level,
    msg: message,
    ts: new Date().toISOString(),
  };
  if (context) {
    Object.assign(entry, context);
  }
  return JSON.stringify(entry);
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(bindings: LogContext): Logger;
}

function createLogger(bindings: LogContext = {}): Logger {
  const merge = (context?: LogContext): LogContext => ({ ...bindings, ...context });

  return {
    debug(message, context) {
      if (!shouldLog('debug')) return;
      console.debug(formatEntry('debug', message, merge(context)));
    },

    info(message, context) {
      if (!shouldLog('info')) return;
      console.info(formatEntry('info', message, merge(context)));
    },

    warn(message, context) {
      if (!shouldLog('warn')) return;
      console.warn(formatEntry('warn', message, merge(context)));
    },

    error(message, context) {
      if (!shouldLog('error')) return;
      console.error(formatEntry('error', message, merge(context)));
    },

    child(extra) {
      return createLogger({ ...bindings, ...extra });
    },
  };
}

export const logger = createLogger();
