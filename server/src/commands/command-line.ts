/**
 * Command line helpers for the command budget.
 *
 * Simple commands (no shell syntax) are split and executed directly;
 * anything that needs a shell goes through `sh -c`.
 */

import { basename } from 'path';

export type CommandKind = 'fast' | 'slow' | 'action';

/** Per-kind timeouts in milliseconds. */
export const COMMAND_TIMEOUTS: Record<CommandKind, number> = {
  fast: 350,
  slow: 800,
  action: 1200,
};

/** Upper bound of the random delay added to each slow scheduled run. */
export const SLOW_JITTER_MS = 200;

const SHELL_META = /[|&;<>$`(){}[\]*?~\n\r]/;
const ENV_ASSIGNMENT = /^[A-Za-z_][A-Za-z0-9_]*=/;

/** Tools that talk to system daemons and routinely take a while. */
const SLOW_TOOLS = new Set([
  'sleep',
  'nmcli',
  'bluetoothctl',
  'rfkill',
  'udevadm',
  'upower',
  'playerctl',
  'pactl',
  'wpctl',
  'brightnessctl',
]);

/**
 * Split a command into argv when it needs no shell. Quotes and backslash
 * escapes are honoured.
 *
 * @returns argv, or null when the command must run through a shell
 */
export function parseSimpleCommand(command: string): string[] | null {
  const trimmed = command.trim();
  if (trimmed === '' || SHELL_META.test(trimmed) || ENV_ASSIGNMENT.test(trimmed)) {
    return null;
  }

  const argv: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escaped = false;

  for (const ch of trimmed) {
    if (escaped) {
      current += ch;
      escaped = false;
      continue;
    }
    if (quote === "'") {
      if (ch === "'") quote = null;
      else current += ch;
      continue;
    }
    if (ch === '\\') {
      escaped = true;
      inToken = true;
      continue;
    }
    if (quote === '"') {
      if (ch === '"') quote = null;
      else current += ch;
      continue;
    }
    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
      continue;
    }
    if (ch === ' ' || ch === '\t') {
      if (inToken) {
        argv.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }
    current += ch;
    inToken = true;
  }

  if (quote !== null || escaped) {
    return null;
  }
  if (inToken) {
    argv.push(current);
  }
  return argv.length > 0 ? argv : null;
}

/** argv to execute: the parsed command, or `sh -c` around the original. */
export function commandArgv(command: string): string[] {
  return parseSimpleCommand(command) ?? ['sh', '-c', command];
}

/**
 * Guess whether a command is slow: pipelines, sleeps and tools that query
 * system daemons.
 */
export function isProbablySlow(command: string): boolean {
  if (command.includes('|')) {
    return true;
  }
  return command
    .split(/[\s;&()]+/)
    .filter((word) => word !== '')
    .some((word) => SLOW_TOOLS.has(basename(word)));
}

export function classifyCommand(command: string): CommandKind {
  return isProbablySlow(command) ? 'slow' : 'fast';
}
