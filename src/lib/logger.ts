/**
 * Standardized Logger Utility
 *
 * Thin wrapper around Pino. Records always go to stderr so they never mix with
 * JSON-RPC traffic on stdout; an optional log file receives a copy.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import pino from 'pino';

export type { Logger } from 'pino';

export interface CreateLoggerOptions extends pino.LoggerOptions {
  /** Append records to this file as well as stderr */
  file?: string | undefined;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  return env.LOG_LEVEL ?? (env.NODE_ENV === 'development' ? 'debug' : 'info');
}

/**
 * Create a Pino logger for the server
 */
export function createLogger(options: CreateLoggerOptions = {}): pino.Logger {
  const { file, ...pinoOptions } = options;
  const loggerOptions: pino.LoggerOptions = {
    name: 'teradata-mcp-server',
    level: resolveLogLevel(),
    ...pinoOptions,
  };

  if (!file) {
    return pino(loggerOptions, pino.destination(2));
  }

  mkdirSync(dirname(file), { recursive: true });
  const level = loggerOptions.level ?? 'info';
  return pino(
    loggerOptions,
    pino.multistream([
      { level, stream: pino.destination(2) },
      { level, stream: pino.destination({ dest: file, append: true, sync: false }) },
    ]),
  );
}

export interface Timer {
  end: (additionalContext?: Record<string, unknown>) => void;
  error: (error: unknown, additionalContext?: Record<string, unknown>) => void;
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
    end(additionalContext: Record<string, unknown> = {}): void {
      const duration = Date.now() - startTime;
      logger.info(
        { operation, duration_ms: duration, ...context, ...additionalContext },
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
