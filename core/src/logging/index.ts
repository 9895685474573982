/**
 * Logging Module
 *
 * Level-filtered console logging, log redaction for notification content,
 * and error classification helpers.
 */

export type { Logger, LogLevel } from "./logger.js";
export {
  createLogger,
  setLogLevel,
  getLogLevel,
  resolveLogLevel,
  isLogLevel,
  LOG_LEVELS,
} from "./logger.js";
export {
  isDiagnosticMode,
  logLimit,
  logSnippet,
  sanitizeForLog,
  DEFAULT_LOG_LIMIT,
} from "./redact.js";
export {
  isNotFoundError,
  isPermissionError,
  isAddressInUseError,
  isConnectionRefusedError,
  getErrorMessage,
} from "./error-utils.js";
