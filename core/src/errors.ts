/**
 * Error taxonomy
 *
 * Every failure the daemon reasons about carries a stable `code` so the
 * control channel and D-Bus adapter can map it without string matching.
 * Only StartupError is fatal; the rest are handled where they occur.
 */

export type NotifluxErrorCode =
  | 'protocol'
  | 'not-found'
  | 'config'
  | 'watcher'
  | 'cache-compute'
  | 'startup';

export class NotifluxError extends Error {
  readonly code: NotifluxErrorCode;

  constructor(code: NotifluxErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed request on the bus or control channel. */
export class ProtocolError extends NotifluxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('protocol', message, options);
  }
}

/** Operation targeted an id that is unknown or already gone. */
export class NotFoundError extends NotifluxError {
  constructor(message: string) {
    super('not-found', message);
  }
}

/** Config or theme failed to parse or validate. */
export class ConfigError extends NotifluxError {
  /** Dotted paths of the offending fields, when known. */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('config', message, options);
    this.issues = issues;
  }
}

export type WatcherFailure = 'timed-out' | 'rejected' | 'exit-status' | 'parse' | 'spawn';

/** External command used by a watcher failed. */
export class WatcherError extends NotifluxError {
  readonly watcherId: string;
  readonly failure: WatcherFailure;

  constructor(watcherId: string, failure: WatcherFailure, message: string) {
    super('watcher', message);
    this.watcherId = watcherId;
    this.failure = failure;
  }
}

/** A cache computation (decode, read, validate) failed. */
export class CacheComputeError extends NotifluxError {
  readonly key: string;

  constructor(key: string, message: string, options?: { cause?: unknown }) {
    super('cache-compute', message, options);
    this.key = key;
  }
}

/** The daemon could not come up: bus name, socket or config dir. */
export class StartupError extends NotifluxError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('startup', message, options);
  }
}

export function isNotifluxError(err: unknown): err is NotifluxError {
  return err instanceof NotifluxError;
}
