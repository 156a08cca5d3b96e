/**
 * Standardized Logger Utility
 *
 * Simple wrapper around Pino logger with helper functions
 * Avoids creating yet another logger interface - just use Pino!
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger with sensible defaults for the builder.
 *
 * Logs go to stderr: stdout carries the architecture-prefixed output of the
 * docker commands and the dry-run plan.
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'multiarch-builder',
      level: process.env.LOG_LEVEL ?? 'info',
      ...options,
    },
    pino.destination(2),
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
 * Create a performance timer for an operation - functional approach
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

      logger.info(
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
          ...context,
          ...additionalContext,
        },
        `Failed ${operation} after ${duration}ms`,
      );
    },
  };
}
