/**
 * Structured Logger
 *
 * JSON lines with levels debug, info, warn, error.
 * Minimum level comes from LOG_LEVEL; otherwise info in production, debug elsewhere.
 * Test runs stay quiet below warn unless LOG_LEVEL says otherwise.
 */

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_PRIORITY;
}

function getMinLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.NODE_ENV === 'production') return 'info';
  if (process.env.NODE_ENV === 'test') return 'warn';
  return 'debug';
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[getMinLevel()];
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
  /** Logger whose entries always include `bound` */
  child(bound: LogContext): Logger;
}

function createLogger(bound: LogContext = {}): Logger {
  const merge = (context?: LogContext) => (context ? { ...bound, ...context } : bound);

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
      return createLogger({ ...bound, ...extra });
    },
  };
}

export const logger = createLogger();
