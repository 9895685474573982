/**
 * Error Utilities
 *
 * Safe error classification and message extraction.
 */

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err) {
    const { code } = err;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Check if an error is a "file not found" error (ENOENT).
 */
export function isNotFoundError(err: unknown): boolean {
  return errorCode(err) === "ENOENT";
}

/**
 * Check if an error is a permission error (EACCES or EPERM).
 */
export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === "EACCES" || code === "EPERM";
}

/**
 * Check if a socket path is already bound by another process.
 */
export function isAddressInUseError(err: unknown): boolean {
  return errorCode(err) === "EADDRINUSE";
}

/**
 * Check if nothing is listening on a socket (ECONNREFUSED).
 */
export function isConnectionRefusedError(err: unknown): boolean {
  return errorCode(err) === "ECONNREFUSED";
}

/**
 * Safely extract a message string from an unknown error value.
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  if (typeof err === "string") {
    return err;
  }
  return String(err);
}
