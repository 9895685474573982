/**
 * Output parsers for status watchers.
 *
 * Each parser turns raw stdout into a structured value or throws a
 * WatcherError with failure `parse`.
 */

import { WatcherError } from '@notiflux/core';
import type { WatcherParser, WatcherValue } from '@notiflux/core';

export type OutputParser = (raw: string, watcherId: string) => WatcherValue;

const ON_WORDS = new Set(['1', 'on', 'yes', 'true', 'enabled', 'connected', 'up', 'active']);

function firstLine(raw: string): string {
  return raw.split('\n').map((line) => line.trim()).find((line) => line !== '') ?? '';
}

export const parseText: OutputParser = (raw) => ({ kind: 'text', text: firstLine(raw) });

export const parseToggle: OutputParser = (raw) => {
  const word = firstLine(raw).toLowerCase().split(/\s+/)[0] ?? '';
  return { kind: 'toggle', on: ON_WORDS.has(word) };
};

/**
 * Percentages like `45%`, `45` or a fraction such as `Volume: 0.45 [MUTED]`.
 */
export const parsePercent: OutputParser = (raw, watcherId) => {
  const line = firstLine(raw);
  const match = /(\d+(?:\.\d+)?)\s*(%)?/.exec(line);
  if (!match) {
    throw new WatcherError(watcherId, 'parse', `no number in output "${line}"`);
  }
  const value = Number.parseFloat(match[1]);
  const isFraction = match[2] === undefined && match[1].includes('.') && value <= 1.5;
  const percent = Math.round(isFraction ? value * 100 : value);
  const muted = /\bmuted\b|\[off\]/i.test(line);
  return { kind: 'percent', percent, muted };
};

export const parseJson: OutputParser = (raw, watcherId) => {
  try {
    const data: unknown = JSON.parse(raw);
    return { kind: 'json', data };
  } catch {
    throw new WatcherError(watcherId, 'parse', 'output is not JSON');
  }
};

// ============================================================
// Built-in probes
// ============================================================

/** `nmcli -t -f STATE general` prints e.g. "connected" or "connected (site only)". */
export const parseNetworkState: OutputParser = (raw) => {
  const state = firstLine(raw).toLowerCase();
  return { kind: 'toggle', on: state.startsWith('connected') };
};

/** `bluetoothctl show` lists controller properties, one of them "Powered: yes". */
export const parseBluetoothPower: OutputParser = (raw) => ({
  kind: 'toggle',
  on: /^\s*Powered:\s*yes\s*$/im.test(raw),
});

/** `rfkill list`: any soft or hard block counts as radio-kill on. */
export const parseRadioKill: OutputParser = (raw) => ({
  kind: 'toggle',
  on: /(soft|hard) blocked:\s*yes/i.test(raw),
});

export const PARSERS: Record<WatcherParser, OutputParser> = {
  text: parseText,
  toggle: parseToggle,
  percent: parsePercent,
  json: parseJson,
};
