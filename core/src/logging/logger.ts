/**
 * Logger
 *
 * Lightweight logger interface shared by core and the daemon.
 * Silent by default: callers opt into output by asking for a non-silent logger.
 * Output is filtered against one process-wide level, which the daemon sets
 * from config (`general.logLevel`) and the NOTIFLUX_LOG environment variable.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

/**
 * Logger interface used throughout the daemon.
 * `log` is info level.
 */
export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
  debug: (...args: unknown[]) => void;
}

const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

let activeLevel: LogLevel = "info";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (LOG_LEVELS as readonly string[]).includes(value);
}

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function getLogLevel(): LogLevel {
  return activeLevel;
}

/**
 * Pick the effective level. The environment wins over config so a user can
 * turn on debug output without touching the config file.
 */
export function resolveLogLevel(
  configured: LogLevel | undefined,
  env: NodeJS.ProcessEnv = process.env,
): LogLevel {
  const fromEnv = env.NOTIFLUX_LOG?.trim().toLowerCase();
  if (isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return configured ?? "info";
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(activeLevel);
}

/**
 * Create a logger instance.
 *
 * @param options.silent - If true (default), all output is suppressed.
 * @param options.prefix - Optional prefix prepended to all messages (e.g., "[Store]").
 */
export function createLogger(options?: {
  silent?: boolean;
  prefix?: string;
}): Logger {
  const { silent = true, prefix } = options || {};

  if (silent) {
    return silentLogger;
  }

  const formatArgs = (args: unknown[]): unknown[] => {
    if (prefix && args.length > 0 && typeof args[0] === "string") {
      return [`${prefix} ${args[0]}`, ...args.slice(1)];
    }
    if (prefix) {
      return [prefix, ...args];
    }
    return args;
  };

  return {
    log: (...args) => {
      if (enabled("info")) console.log(...formatArgs(args));
    },
    warn: (...args) => {
      if (enabled("warn")) console.warn(...formatArgs(args));
    },
    error: (...args) => {
      if (enabled("error")) console.error(...formatArgs(args));
    },
    debug: (...args) => {
      if (enabled("debug")) console.debug(...formatArgs(args));
    },
  };
}
