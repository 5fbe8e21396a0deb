/**
 * Structured Logging with Correlation IDs
 *
 * All logs automatically include correlation IDs from AsyncLocalStorage context.
 * Lines below the configured level (LOG_LEVEL) are dropped.
 */

import { getCorrelationId, getContext } from './context';
import { config, LOG_LEVELS, type LogLevel } from './config';
import { isRecord } from './guards';

export interface LogContext {
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: unknown, context?: LogContext): void;
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const reqContext = getContext();

  const logEntry = {
    timestamp: new Date().toISOString(),
    level: level.toUpperCase(),
    correlationId: getCorrelationId(),
    documentId: reqContext?.documentId,
    stage: reqContext?.stage,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

// Shape check so errors from other realms (vm, worker threads) keep their stack.
function serializeError(error: unknown): unknown {
  if (isRecord(error) && typeof error.message === 'string') {
    return {
      message: error.message,
      stack: typeof error.stack === 'string' ? error.stack : undefined,
      name: typeof error.name === 'string' ? error.name : 'Error',
    };
  }
  return String(error);
}

export function createLogger(minLevel: LogLevel): Logger {
  const threshold = LOG_LEVELS.indexOf(minLevel);
  const enabled = (level: LogLevel) => LOG_LEVELS.indexOf(level) >= threshold;

  return {
    debug: (message, context) => {
      if (enabled('debug')) console.debug(formatLog('debug', message, context));
    },

    info: (message, context) => {
      if (enabled('info')) console.log(formatLog('info', message, context));
    },

    warn: (message, context) => {
      if (enabled('warn')) console.warn(formatLog('warn', message, context));
    },

    error: (message, error, context) => {
      console.error(formatLog('error', message, { ...context, error: serializeError(error) }));
    },
  };
}

export const logger: Logger = createLogger(config.logLevel);
