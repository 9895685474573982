/**
 * Logger factory for the daemon.
 *
 * Daemon components take an optional injected logger and fall back to a
 * silent one, so tests stay quiet. The entry point builds the real loggers
 * with a component prefix.
 */

import { createLogger as createCoreLogger, resolveLogLevel, setLogLevel } from '@notiflux/core';
import type { Logger, LogLevel } from '@notiflux/core';

export type { Logger, LogLevel };

export function createLogger(options?: { silent?: boolean; prefix?: string }): Logger {
  return createCoreLogger(options);
}

/**
 * Build a prefixed child logger factory bound to one silence setting.
 */
export function createLoggerFactory(silent: boolean): (prefix: string) => Logger {
  return (prefix) => createCoreLogger({ silent, prefix: `[${prefix}]` });
}

/**
 * Apply the configured log level, letting NOTIFLUX_LOG override it.
 */
export function applyLogLevel(configured: LogLevel, env: NodeJS.ProcessEnv = process.env): LogLevel {
  const level = resolveLogLevel(configured, env);
  setLogLevel(level);
  return level;
}
