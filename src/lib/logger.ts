/**
 * Standardized Logger Utility
 *
 * Simple wrapper around Pino logger with helper functions
 */

import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Create a Pino logger for the scanner. Output goes to stderr so that stdout
 * only carries the report.
 */
export function createLogger(options: pino.LoggerOptions = {}): pino.Logger {
  return pino(
    {
      name: 'org-dependency-scanner',
      level: process.env.LOG_LEVEL ?? (process.env.NODE_ENV === 'development' ? 'debug' : 'info'),
      ...options,
    },
    pino.destination(2),
  );
}

export type LogFields = Record<string, unknown>;

/**
 * Stage timer for a long-running operation such as an organization scan
 */
export interface Timer {
  /** Log progress at a named stage and return the elapsed milliseconds */
  checkpoint: (stage: string, fields?: LogFields) => number;
  end: (fields?: LogFields) => void;
  error: (error: unknown, fields?: LogFields) => void;
}

export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: LogFields = {},
  now: () => number = Date.now,
): Timer {
  const startedAt = now();
  const elapsed = (): number => now() - startedAt;

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    checkpoint(stage, fields = {}) {
      const ms = elapsed();
      logger.debug({ operation, stage, elapsed_ms: ms, ...context, ...fields }, `${operation}: ${stage} after ${ms}ms`);
      return ms;
    },

    end(fields = {}) {
      const ms = elapsed();
      logger.info({ operation, duration_ms: ms, ...context, ...fields }, `Completed ${operation} in ${ms}ms`);
    },

    error(error, fields = {}) {
      const ms = elapsed();
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error({ operation, duration_ms: ms, err, ...context, ...fields }, `Failed ${operation} after ${ms}ms`);
    },
  };
}
