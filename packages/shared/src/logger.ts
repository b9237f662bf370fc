/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation and thread IDs from AsyncLocalStorage context.
 * LOG_LEVEL (debug | info | warn | error | silent) sets the lowest level written.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function minimumRank(): number {
  const configured = (process.env.LOG_LEVEL || '').toLowerCase();
  if (configured === 'debug' || configured === 'info' || configured === 'warn' ||
      configured === 'error' || configured === 'silent') {
    return LEVEL_RANK[configured];
  }
  return process.env.NODE_ENV === 'production' ? LEVEL_RANK.info : LEVEL_RANK.debug;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_RANK[level] >= minimumRank();
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    threadId: reqContext?.threadId,
    recordId: reqContext?.recordId,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (!enabled('info')) return;
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (!enabled('warn')) return;
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    if (!enabled('error')) return;
    const errorContext = {
      ...context,
      error:
        error instanceof Error
          ? {
              message: error.message,
              stack: error.stack,
              name: error.name,
            }
          : String(error),
    };
    console.error(formatLog('ERROR', message, errorContext));
  },

  debug: (message: string, context?: LogContext) => {
    if (!enabled('debug')) return;
    console.debug(formatLog('DEBUG', message, context));
  },
};
