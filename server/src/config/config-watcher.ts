/**
 * Config Watcher
 *
 * Watches the config directory (and the directory of any theme file kept
 * elsewhere) and reports, after a short debounce, whether the config file,
 * theme files, or both changed. Editors that save by rename produce several
 * events per save; the debounce folds them into one callback.
 */

import { watch } from 'fs';
import { dirname, join, resolve } from 'path';
import { getErrorMessage } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

export const CONFIG_DEBOUNCE_MS = 250;

export interface DirectoryWatch {
  close(): void;
}

export type DirectoryWatchFn = (
  dir: string,
  onChange: (filename: string | null) => void,
  onError: (err: Error) => void,
) => DirectoryWatch;

export interface ConfigChange {
  config: boolean;
  /** Absolute paths of changed theme files. */
  themePaths: string[];
}

export interface ConfigWatcherConfig {
  configPath: string;
  themePaths: readonly string[];
  onChange: (change: ConfigChange) => void;
  debounceMs?: number;
  watchDirectory?: DirectoryWatchFn;
  logger?: Logger;
}

export const watchWithFs: DirectoryWatchFn = (dir, onChange, onError) => {
  const watcher = watch(dir, { persistent: false }, (_event, filename) => {
    onChange(filename === null ? null : filename.toString());
  });
  watcher.on('error', onError);
  return watcher;
};

export class ConfigWatcher {
  private configPath: string;
  private themePaths: Set<string>;
  private onChange: (change: ConfigChange) => void;
  private debounceMs: number;
  private watchDirectory: DirectoryWatchFn;
  private logger: Logger;

  private watches = new Map<string, DirectoryWatch>();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private pendingConfig = false;
  private pendingThemes = new Set<string>();

  constructor(config: ConfigWatcherConfig) {
    this.configPath = resolve(config.configPath);
    this.themePaths = new Set(config.themePaths.map((path) => resolve(path)));
    this.onChange = config.onChange;
    this.debounceMs = config.debounceMs ?? CONFIG_DEBOUNCE_MS;
    this.watchDirectory = config.watchDirectory ?? watchWithFs;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get debug() { return this.logger.debug.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  get directories(): string[] {
    return Array.from(this.watches.keys());
  }

  start(): void {
    this.syncWatches();
  }

  /** Follow theme files to new locations after a config reload. */
  setThemePaths(paths: readonly string[]): void {
    this.themePaths = new Set(paths.map((path) => resolve(path)));
    if (this.watches.size > 0) {
      this.syncWatches();
    }
  }

  stop(): void {
    for (const handle of this.watches.values()) {
      handle.close();
    }
    this.watches.clear();
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.pendingConfig = false;
    this.pendingThemes.clear();
  }

  // ----------------------------------------------------------
  // Internals
  // ----------------------------------------------------------

  private wantedDirectories(): Set<string> {
    const dirs = new Set([dirname(this.configPath)]);
    for (const path of this.themePaths) {
      dirs.add(dirname(path));
    }
    return dirs;
  }

  private syncWatches(): void {
    const wanted = this.wantedDirectories();
    for (const [dir, handle] of this.watches) {
      if (!wanted.has(dir)) {
        handle.close();
        this.watches.delete(dir);
      }
    }
    for (const dir of wanted) {
      if (this.watches.has(dir)) continue;
      try {
        const handle = this.watchDirectory(
          dir,
          (filename) => this.handleEvent(dir, filename),
          (err) => this.warn(`Watch on ${dir} failed: ${getErrorMessage(err)}`),
        );
        this.watches.set(dir, handle);
      } catch (err) {
        this.warn(`Cannot watch ${dir}: ${getErrorMessage(err)}`);
      }
    }
  }

  private handleEvent(dir: string, filename: string | null): void {
    if (filename === null) {
      // Some platforms omit the name; treat it as "anything may have changed".
      this.pendingConfig = dir === dirname(this.configPath) || this.pendingConfig;
      for (const path of this.themePaths) {
        if (dirname(path) === dir) this.pendingThemes.add(path);
      }
    } else {
      const path = join(dir, filename);
      if (path === this.configPath) {
        this.pendingConfig = true;
      } else if (this.themePaths.has(path)) {
        this.pendingThemes.add(path);
      } else {
        return;
      }
    }
    this.schedule();
  }

  private schedule(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.flush(), this.debounceMs);
  }

  private flush(): void {
    this.timer = null;
    const change: ConfigChange = { config: this.pendingConfig, themePaths: Array.from(this.pendingThemes) };
    this.pendingConfig = false;
    this.pendingThemes.clear();
    if (!change.config && change.themePaths.length === 0) return;
    this.debug(`Change detected: config=${change.config} themes=${change.themePaths.length}`);
    this.onChange(change);
  }
}
