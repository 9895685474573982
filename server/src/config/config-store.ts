/**
 * Config Store
 *
 * Owns the live config snapshot. Readers call current() and keep whatever
 * they got; a reload builds a complete new snapshot first and swaps it in
 * only when everything validated. A failed reload leaves the old snapshot
 * live.
 */

import { mkdir } from 'fs/promises';
import {
  ConfigError,
  StartupError,
  buildConfigSnapshot,
  getDefaultConfig,
  getErrorMessage,
  loadConfigSnapshot,
} from '@notiflux/core';
import type { ConfigSnapshot } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

export type ReloadResult = { ok: true; snapshot: ConfigSnapshot } | { ok: false; error: ConfigError };

export type SnapshotListener = (snapshot: ConfigSnapshot, previous: ConfigSnapshot) => void;
export type ReloadFailureListener = (error: ConfigError) => void;

export type SnapshotLoader = (configDir: string, version: number) => Promise<ConfigSnapshot>;

export interface ConfigStoreConfig {
  initial: ConfigSnapshot;
  load?: SnapshotLoader;
  logger?: Logger;
}

function asConfigError(err: unknown): ConfigError {
  return err instanceof ConfigError ? err : new ConfigError(getErrorMessage(err), [], { cause: err });
}

export class ConfigStore {
  private snapshot: ConfigSnapshot;
  private load: SnapshotLoader;
  private logger: Logger;
  private listeners = new Set<SnapshotListener>();
  private failureListeners = new Set<ReloadFailureListener>();
  private reloading: Promise<ReloadResult> | null = null;
  private reloadQueued = false;

  constructor(config: ConfigStoreConfig) {
    this.snapshot = config.initial;
    this.load = config.load ?? loadConfigSnapshot;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }
  private get error() { return this.logger.error.bind(this.logger); }

  /**
   * Create the config directory if needed and load the first snapshot.
   * A config file that fails validation at startup is reported and the
   * defaults are used; an unusable directory is fatal.
   * @throws StartupError
   */
  static async open(
    configDir: string,
    options: { load?: SnapshotLoader; logger?: Logger } = {},
  ): Promise<ConfigStore> {
    const logger = options.logger ?? createLogger({ silent: true });
    const load = options.load ?? loadConfigSnapshot;
    try {
      await mkdir(configDir, { recursive: true });
    } catch (err) {
      throw new StartupError(`cannot create config directory ${configDir}: ${getErrorMessage(err)}`, { cause: err });
    }

    let initial: ConfigSnapshot;
    try {
      initial = await load(configDir, 1);
    } catch (err) {
      const error = asConfigError(err);
      logger.error(`Config rejected, starting with defaults: ${error.message}`);
      initial = buildConfigSnapshot({ config: getDefaultConfig(), source: 'defaults', configDir, version: 1 });
    }
    return new ConfigStore({ initial, load, logger });
  }

  current(): ConfigSnapshot {
    return this.snapshot;
  }

  subscribe(listener: SnapshotListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  onReloadFailed(listener: ReloadFailureListener): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  /**
   * Re-read the config file. Calls made while a reload runs are folded
   * into one follow-up reload.
   */
  reload(): Promise<ReloadResult> {
    if (this.reloading) {
      this.reloadQueued = true;
      return this.reloading;
    }
    this.reloading = this.runReload().finally(() => {
      this.reloading = null;
      if (this.reloadQueued) {
        this.reloadQueued = false;
        this.reload().catch((err: unknown) => {
          this.error(`Queued reload failed: ${getErrorMessage(err)}`);
        });
      }
    });
    return this.reloading;
  }

  private async runReload(): Promise<ReloadResult> {
    const previous = this.snapshot;
    let next: ConfigSnapshot;
    try {
      next = await this.load(previous.configDir, previous.version + 1);
    } catch (err) {
      const error = asConfigError(err);
      this.warn(`Config reload failed, keeping version ${previous.version}: ${error.message}`);
      for (const listener of this.failureListeners) {
        this.notify(() => listener(error));
      }
      return { ok: false, error };
    }

    this.snapshot = next;
    this.log(`Config reloaded (version ${next.version}, ${next.source})`);
    for (const listener of this.listeners) {
      this.notify(() => listener(next, previous));
    }
    return { ok: true, snapshot: next };
  }

  /** Subscriber errors are logged and skipped. */
  private notify(call: () => void): void {
    try {
      call();
    } catch (err) {
      this.error(`Config subscriber failed: ${getErrorMessage(err)}`);
    }
  }
}
