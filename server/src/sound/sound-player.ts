/**
 * Sound Player
 *
 * Plays a notification sound through the first available backend:
 *   canberra-gtk-play  theme sound names and files
 *   pw-play, paplay    files only
 *
 * Playback goes through the command budget (kind `action`) with its own
 * ceiling, and is rate limited so a burst of notifications makes one sound.
 */

import { isAbsolute, resolve } from 'path';
import { hintBool, hintString, logSnippet } from '@notiflux/core';
import type { Notification, SoundConfig } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import type { CommandBudget } from '../commands/command-budget.js';
import { programInPath } from '../commands/program-path.js';

export type SoundBackend = 'canberra' | 'pw-play' | 'paplay';

export type SoundSource = { kind: 'name'; name: string } | { kind: 'file'; path: string };

const BACKEND_PROGRAMS: ReadonlyArray<[SoundBackend, string]> = [
  ['canberra', 'canberra-gtk-play'],
  ['pw-play', 'pw-play'],
  ['paplay', 'paplay'],
];

export async function detectSoundBackend(env: NodeJS.ProcessEnv = process.env): Promise<SoundBackend | null> {
  for (const [backend, program] of BACKEND_PROGRAMS) {
    if (await programInPath(program, env)) {
      return backend;
    }
  }
  return null;
}

// ============================================================
// Sound sources
// ============================================================

const PERCENT = 0x25;

function hexDigit(byte: number | undefined): number | null {
  if (byte === undefined) return null;
  const digit = Number.parseInt(String.fromCharCode(byte), 16);
  return Number.isNaN(digit) ? null : digit;
}

function percentDecode(value: string): string | null {
  const input = Buffer.from(value, 'utf-8');
  const out: number[] = [];
  for (let i = 0; i < input.length; i++) {
    if (input[i] !== PERCENT) {
      out.push(input[i]);
      continue;
    }
    const hi = hexDigit(input[i + 1]);
    const lo = hexDigit(input[i + 2]);
    if (hi === null || lo === null) return null;
    const byte = (hi << 4) | lo;
    if (byte === 0) return null;
    out.push(byte);
    i += 2;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(Uint8Array.from(out));
  } catch {
    return null;
  }
}

/**
 * Local path of a `file://` URI. Remote hosts, bad escapes and NUL bytes
 * are refused.
 */
export function decodeFileUri(value: string): string | null {
  if (!value.startsWith('file://')) return null;
  const rest = value.slice('file://'.length);
  const slash = rest.indexOf('/');
  const host = slash === -1 ? '' : rest.slice(0, slash);
  const path = slash === -1 ? rest : rest.slice(slash);
  if (host !== '' && host !== 'localhost') return null;
  const decoded = percentDecode(path);
  return decoded !== null && decoded.startsWith('/') ? decoded : null;
}

/** `sound-file` wins over `sound-name`. */
export function soundFromHints(notification: Notification): SoundSource | null {
  const file = hintString(notification.hints, 'sound-file')?.trim();
  if (file) {
    if (file.startsWith('file://')) {
      const path = decodeFileUri(file);
      if (path !== null) return { kind: 'file', path };
    } else if (isAbsolute(file)) {
      return { kind: 'file', path: file };
    }
  }
  const name = hintString(notification.hints, 'sound-name')?.trim();
  return name ? { kind: 'name', name } : null;
}

export function backendArgv(backend: SoundBackend, source: SoundSource): string[] | null {
  if (backend === 'canberra') {
    return source.kind === 'name'
      ? ['canberra-gtk-play', '-i', source.name]
      : ['canberra-gtk-play', '-f', source.path];
  }
  // pw-play and paplay only play files.
  return source.kind === 'file' ? [backend, source.path] : null;
}

// ============================================================
// Player
// ============================================================

export interface SoundPlayerConfig {
  sound: SoundConfig;
  configDir: string;
  budget: CommandBudget;
  backend: SoundBackend | null;
  now?: () => number;
  logger?: Logger;
}

export type PlayResult = 'played' | 'disabled' | 'suppressed' | 'rate-limited' | 'no-source' | 'unsupported' | 'failed';

export class SoundPlayer {
  private sound: SoundConfig;
  private configDir: string;
  private budget: CommandBudget;
  private backend: SoundBackend | null;
  private now: () => number;
  private logger: Logger;
  private lastPlayedAt: number | null = null;

  constructor(config: SoundPlayerConfig) {
    this.sound = config.sound;
    this.configDir = config.configDir;
    this.budget = config.budget;
    this.backend = config.backend;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger({ silent: true });
    this.budget.setMaxConcurrent(config.sound.maxConcurrent);
    if (this.sound.enabled && this.backend === null) {
      this.logger.warn('Sound enabled but no playback backend found in PATH');
    }
  }

  private get debug() { return this.logger.debug.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  /** Whether to advertise the `sound` capability. */
  supportsSound(): boolean {
    return this.sound.enabled && this.backend !== null;
  }

  reconfigure(sound: SoundConfig, configDir: string): void {
    this.sound = sound;
    this.configDir = configDir;
    this.budget.setMaxConcurrent(sound.maxConcurrent);
  }

  private defaultSource(): SoundSource | null {
    if (this.sound.defaultFile) {
      return { kind: 'file', path: resolve(this.configDir, this.sound.defaultFile) };
    }
    return this.sound.defaultName ? { kind: 'name', name: this.sound.defaultName } : null;
  }

  /**
   * Play the sound for a notification. `allowed` is false while the
   * notification is held back by do-not-disturb.
   */
  async playFor(notification: Notification, allowed = true): Promise<PlayResult> {
    if (!this.sound.enabled || this.backend === null) return 'disabled';
    if (!allowed || notification.suppressSound || hintBool(notification.hints, 'suppress-sound')) {
      return 'suppressed';
    }

    const now = this.now();
    if (this.lastPlayedAt !== null && now - this.lastPlayedAt < this.sound.minIntervalMs) {
      return 'rate-limited';
    }

    const source = soundFromHints(notification) ?? this.defaultSource();
    if (!source) return 'no-source';
    const argv = backendArgv(this.backend, source);
    if (!argv) {
      this.debug(`${this.backend} cannot play sound names`);
      return 'unsupported';
    }

    this.lastPlayedAt = now;
    const command = argv.join(' ');
    const outcome = await this.budget.run({ command, argv, kind: 'action', timeoutMs: this.sound.timeoutMs });
    switch (outcome.status) {
      case 'completed':
        if (outcome.exitCode === 0) return 'played';
        this.warn(`Sound command exited with ${outcome.exitCode ?? outcome.signal}: ${logSnippet(command)}`);
        return 'failed';
      case 'rejected':
        this.debug('Sound skipped, concurrency limit reached');
        return 'failed';
      case 'timed-out':
        return 'failed';
      case 'failed':
        this.warn(`Sound command failed: ${outcome.error}`);
        return 'failed';
    }
  }
}
