/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Logs go to stderr so the CLI report on stdout
 * stays machine-readable.
 */

import pino from 'pino';

export type { Logger } from 'pino';

export interface LoggerSettings {
  name?: string;
  level?: string;
  pretty?: boolean;
}

/**
 * Create a Pino logger with sensible defaults for the catalog harness
 */
export function createLogger(settings: LoggerSettings = {}): pino.Logger {
  const options: pino.LoggerOptions = {
    name: settings.name ?? 'tekton-catalog-e2e',
    level: settings.level ?? 'info',
    redact: {
      paths: ['token', 'password', 'secret', '*.token', '*.password'],
      censor: '[REDACTED]',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };

  if (settings.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          destination: 2,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
          errorProps: 'stack,cause',
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

/**
 * Performance timer interface
 */
export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => number;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => number;
}

/**
 * Create a performance timer for an operation
 */
export function createTimer(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): Timer {
  const startTime = Date.now();

  logger.debug({ operation, ...context }, `Starting ${operation}`);

  return {
    end(additionalContext: Record<string, unknown> = {}): number {
      const duration = Date.now() - startTime;

      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
        `Completed ${operation} in ${duration}ms`,
      );
      return duration;
    },

    error(error: unknown, additionalContext: Record<string, unknown> = {}): number {
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
      return duration;
    },
  };
}
