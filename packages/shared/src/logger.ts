/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * LOG_LEVEL (debug | info | warn | error | silent) sets the threshold; default info.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = (typeof LEVELS)[number];

const LEVEL_NAMES: readonly string[] = LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.includes(value);
}

/**
 * Read on every call so the threshold can change at runtime (tests set it).
 */
export function getLogLevel(): LogLevel {
  const level = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

function enabled(level: Exclude<LogLevel, 'silent'>): boolean {
  return LEVELS.indexOf(level) >= LEVELS.indexOf(getLogLevel());
}

function formatLog(level: string, message: string, context?: LogContext): string {
  const correlationId = getCorrelationId();
  const timestamp = new Date().toISOString();
  const reqContext = getContext();

  const logEntry = {
    timestamp,
    level,
    correlationId,
    documentId: reqContext?.documentId,
    sourceFilename: reqContext?.sourceFilename,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    if (enabled('info')) console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    if (enabled('warn')) console.warn(formatLog('WARN', message, context));
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
    if (enabled('debug')) console.debug(formatLog('DEBUG', message, context));
  },
};
