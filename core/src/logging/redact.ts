/**
 * Redaction helpers for log output.
 *
 * Notification text and command lines can carry private content, so they
 * never reach the log verbatim. With NOTIFLUX_DIAGNOSTIC set, short
 * sanitized snippets are logged instead of a length marker.
 */

export const DEFAULT_LOG_LIMIT = 96;
export const MIN_LOG_LIMIT = 16;
export const MAX_LOG_LIMIT = 512;

const TRUTHY = new Set(["1", "true", "yes", "on"]);

export function isDiagnosticMode(env: NodeJS.ProcessEnv = process.env): boolean {
  const raw = env.NOTIFLUX_DIAGNOSTIC;
  return raw !== undefined && TRUTHY.has(raw.trim().toLowerCase());
}

export function logLimit(env: NodeJS.ProcessEnv = process.env): number {
  const parsed = Number.parseInt(env.NOTIFLUX_LOG_LIMIT ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return DEFAULT_LOG_LIMIT;
  }
  return Math.min(MAX_LOG_LIMIT, Math.max(MIN_LOG_LIMIT, parsed));
}

/**
 * Collapse newlines and drop control characters so a snippet stays on one line.
 */
export function sanitizeForLog(text: string): string {
  let out = "";
  for (const ch of text) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === "\n" || ch === "\r" || ch === "\t") {
      out += " ";
    } else if (code < 0x20 || code === 0x7f) {
      continue;
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Render untrusted text for a log line.
 *
 * Outside diagnostic mode only the length is shown.
 */
export function logSnippet(text: string, env: NodeJS.ProcessEnv = process.env): string {
  if (!isDiagnosticMode(env)) {
    return `<redacted ${text.length} chars>`;
  }
  const clean = sanitizeForLog(text);
  const limit = logLimit(env);
  const chars = Array.from(clean);
  if (chars.length <= limit) {
    return clean;
  }
  return `${chars.slice(0, limit).join("")}…`;
}
