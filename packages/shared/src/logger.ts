/**
 * Structured Logging with Correlation IDs
 *
 * Every line is a JSON object carrying the correlation ID and, inside a
 * document pipeline, the document ID and source file.
 */

import { getCorrelationId, getContext } from './context';

export interface LogContext {
  [key: string]: unknown;
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
    sourceFile: reqContext?.sourceFile,
    message,
    ...context,
  };

  return JSON.stringify(logEntry);
}

function describeError(error: unknown): LogContext[string] {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
      name: error.name,
      code: 'code' in error ? error.code : undefined,
    };
  }
  return String(error);
}

export const logger = {
  info: (message: string, context?: LogContext) => {
    console.log(formatLog('INFO', message, context));
  },

  warn: (message: string, context?: LogContext) => {
    console.warn(formatLog('WARN', message, context));
  },

  error: (message: string, error?: Error | unknown, context?: LogContext) => {
    console.error(formatLog('ERROR', message, { ...context, error: describeError(error) }));
  },

  debug: (message: string, context?: LogContext) => {
    if (process.env.LOG_LEVEL === 'debug' || process.env.NODE_ENV !== 'production') {
      console.debug(formatLog('DEBUG', message, context));
    }
  },
};
