/**
 * Daemon process lifecycle: start, wait for a signal, shut down.
 */

import { getErrorMessage, isNotifluxError } from '@notiflux/core';
import { createLogger } from './logging/logger-factory.js';
import { startDaemon } from './daemon.js';
import type { Daemon, DaemonOptions } from './daemon.js';

export const EXIT_OK = 0;
export const EXIT_STARTUP_FAILED = 1;

/**
 * Run the daemon until SIGINT or SIGTERM.
 * @returns the process exit code
 */
export async function runDaemon(options: DaemonOptions = {}): Promise<number> {
  const logger = createLogger({ silent: options.silent ?? false, prefix: '[notiflux]' });

  let daemon: Daemon;
  try {
    daemon = await startDaemon(options);
  } catch (err) {
    if (isNotifluxError(err) && err.code === 'startup') {
      logger.error(`Startup failed: ${err.message}`);
      return EXIT_STARTUP_FAILED;
    }
    throw err;
  }

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      process.off('SIGINT', shutdown);
      process.off('SIGTERM', shutdown);
      logger.log(`Received ${signal}`);
      daemon
        .stop()
        .catch((err: unknown) => {
          logger.error(`Shutdown failed: ${getErrorMessage(err)}`);
        })
        .finally(resolve);
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
  });
  return EXIT_OK;
}
