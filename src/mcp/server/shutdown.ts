/**
 * Graceful shutdown and the liveness marker file used by container health checks
 */

import { constants } from 'node:os';
import { rmSync, writeFileSync } from 'node:fs';
import { errorMessage } from '../../lib/errors';
import type { Logger } from '../../lib/logger';

export const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

export function writeAliveFile(path: string, logger: Logger): void {
  try {
    writeFileSync(path, `${process.pid}\n`);
    logger.debug({ path }, 'Alive file written');
  } catch (error) {
    logger.warn({ path, error: errorMessage(error) }, 'Unable to write alive file');
  }
}

export function removeAliveFile(path: string, logger: Logger): void {
  try {
    rmSync(path, { force: true });
  } catch (error) {
    logger.warn({ path, error: errorMessage(error) }, 'Unable to remove alive file');
  }
}

export function signalExitCode(signal: NodeJS.Signals): number {
  const number = Object.entries(constants.signals).find(([name]) => name === signal)?.[1];
  return 128 + (number ?? 0);
}

export interface ShutdownOptions {
  logger: Logger;
  close: () => Promise<void>;
  aliveFile?: string | undefined;
  exit?: (code: number) => void;
}

/**
 * Build the signal handler. The first signal closes the server and exits with
 * 128 + signal number; a second signal during shutdown exits immediately.
 */
export function createShutdownHandler(
  options: ShutdownOptions,
): (signal: NodeJS.Signals) => Promise<void> {
  const exit = options.exit ?? ((code: number) => process.exit(code));
  let shuttingDown = false;

  return async (signal) => {
    if (shuttingDown) {
      options.logger.warn({ signal }, 'Second signal received, forcing exit');
      exit(1);
      return;
    }
    shuttingDown = true;
    options.logger.info({ signal }, 'Shutting down');

    if (options.aliveFile !== undefined) {
      removeAliveFile(options.aliveFile, options.logger);
    }
    try {
      await options.close();
      options.logger.info('Server stopped');
    } catch (error) {
      options.logger.error({ error: errorMessage(error) }, 'Error during shutdown');
    }
    exit(signalExitCode(signal));
  };
}

export function installSignalHandlers(
  handler: (signal: NodeJS.Signals) => Promise<void>,
  logger: Logger,
  signals: readonly NodeJS.Signals[] = SHUTDOWN_SIGNALS,
): void {
  for (const signal of signals) {
    process.on(signal, () => {
      handler(signal).catch((error: unknown) => {
        logger.error({ signal, error: errorMessage(error) }, 'Shutdown handler failed');
      });
    });
  }
}
