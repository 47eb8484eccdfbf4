/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino with helper functions.
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger with the operator's defaults.
 *
 * The CLI writes rendered output to stdout, so logs go to stderr there
 * (`OPERATOR_LOG_STDERR=true` or `toStderr`).
 */
export function createLogger(
  options: pino.LoggerOptions & { toStderr?: boolean } = {},
): pino.Logger {
  const { toStderr, ...loggerOptions } = options;
  const useStderr = toStderr ?? process.env.OPERATOR_LOG_STDERR === 'true';

  return pino(
    {
      name: 'gunicorn-operator',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      ...loggerOptions,
    },
    useStderr ? pino.destination(2) : undefined,
  );
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
}

/**
 * Create a timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.debug(
        {
          operation,
          duration_ms: duration,
          ...context,
          ...additionalContext,
        },
        `Completed ${operation} in ${duration}ms`,
      );
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;

      logger.error(
        {
          operation,
          duration_ms: duration,
          error: error instanceof Error ? error.message : String(error),
          stack: error instanceof Error ? error.stack : undefined,
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
