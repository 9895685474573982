/**
 * Watcher Manager
 *
 * Builds the built-in and user-defined status watchers from the widgets
 * config and runs them only while the panel is visible.
 */

import { getErrorMessage } from '@notiflux/core';
import type { WidgetsConfig } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import type { CommandBudget } from '../commands/command-budget.js';
import { classifyCommand } from '../commands/command-line.js';
import { StatusWatcher } from './status-watcher.js';
import type { StatusWatcherDefinition } from './status-watcher.js';
import {
  PARSERS,
  parseBluetoothPower,
  parseNetworkState,
  parsePercent,
  parseRadioKill,
} from './parsers.js';
import type { WatcherResultWriter } from './watcher-results.js';

export interface WatcherManagerConfig {
  budget: CommandBudget;
  writer: WatcherResultWriter;
  widgets: WidgetsConfig;
  logger?: Logger;
}

// ============================================================
// Definitions
// ============================================================

export function builtinDefinitions(widgets: WidgetsConfig): StatusWatcherDefinition[] {
  const intervalMs = widgets.refreshIntervalSlowMs;
  const definitions: StatusWatcherDefinition[] = [];
  const { builtins } = widgets;

  if (builtins.network) {
    definitions.push({
      id: 'network',
      command: 'nmcli -t -f STATE general',
      parse: parseNetworkState,
      intervalMs,
      kind: 'slow',
    });
  }
  if (builtins.bluetooth) {
    definitions.push({
      id: 'bluetooth',
      command: 'bluetoothctl show',
      parse: parseBluetoothPower,
      intervalMs,
      kind: 'slow',
    });
  }
  if (builtins.radioKill) {
    definitions.push({
      id: 'radio-kill',
      command: 'rfkill list',
      parse: parseRadioKill,
      intervalMs,
      kind: 'slow',
    });
  }
  if (builtins.audio) {
    definitions.push({
      id: 'audio',
      command: 'wpctl get-volume @DEFAULT_AUDIO_SINK@',
      watchCommand: 'pactl subscribe',
      parse: parsePercent,
      intervalMs,
      kind: 'slow',
    });
  }
  return definitions;
}

/**
 * Every enabled watcher, built-ins first. A user watcher with a built-in's
 * id replaces it.
 */
export function watcherDefinitions(widgets: WidgetsConfig): StatusWatcherDefinition[] {
  const byId = new Map<string, StatusWatcherDefinition>();
  for (const definition of builtinDefinitions(widgets)) {
    byId.set(definition.id, definition);
  }
  for (const watcher of widgets.watchers) {
    if (!watcher.enabled) {
      byId.delete(watcher.id);
      continue;
    }
    const kind = classifyCommand(watcher.command);
    byId.set(watcher.id, {
      id: watcher.id,
      command: watcher.command,
      watchCommand: watcher.watchCommand,
      parse: PARSERS[watcher.parser],
      intervalMs: watcher.intervalMs ?? (kind === 'slow' ? widgets.refreshIntervalSlowMs : widgets.refreshIntervalMs),
      timeoutMs: watcher.timeoutMs,
      kind,
    });
  }
  return Array.from(byId.values());
}

// ============================================================
// Manager
// ============================================================

export class WatcherManager {
  private budget: CommandBudget;
  private writer: WatcherResultWriter;
  private logger: Logger;
  private watchers = new Map<string, StatusWatcher>();
  private visible = false;

  constructor(config: WatcherManagerConfig) {
    this.budget = config.budget;
    this.writer = config.writer;
    this.logger = config.logger ?? createLogger({ silent: true });
    this.build(config.widgets);
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  get ids(): string[] {
    return Array.from(this.watchers.keys());
  }

  isVisible(): boolean {
    return this.visible;
  }

  /** Resume every watcher when the panel shows; pause them when it hides. */
  setVisible(visible: boolean): void {
    if (visible === this.visible) return;
    this.visible = visible;
    for (const watcher of this.watchers.values()) {
      if (visible) watcher.resume();
      else watcher.pause();
    }
    this.log(`Watchers ${visible ? 'resumed' : 'paused'} (${this.watchers.size})`);
  }

  /** Probe everything now, e.g. after an action changed system state. */
  refreshAll(): void {
    if (!this.visible) return;
    for (const watcher of this.watchers.values()) {
      watcher.probe().catch((err: unknown) => {
        this.warn(`${watcher.id} refresh failed: ${getErrorMessage(err)}`);
      });
    }
  }

  /** Replace the watcher set after a config reload. */
  reconfigure(widgets: WidgetsConfig): void {
    const previous = new Set(this.watchers.keys());
    for (const watcher of this.watchers.values()) {
      watcher.pause();
    }
    this.watchers.clear();
    this.build(widgets);

    for (const id of previous) {
      if (!this.watchers.has(id)) {
        this.writer.remove(id);
      }
    }
    if (this.visible) {
      for (const watcher of this.watchers.values()) {
        watcher.resume();
      }
    }
  }

  stop(): void {
    for (const watcher of this.watchers.values()) {
      watcher.pause();
    }
    this.visible = false;
    this.budget.stopStreams();
  }

  private build(widgets: WidgetsConfig): void {
    this.budget.setMaxConcurrent(widgets.maxConcurrent);
    for (const definition of watcherDefinitions(widgets)) {
      const watcher = new StatusWatcher({
        definition,
        budget: this.budget,
        writer: this.writer,
        logger: this.logger,
      });
      this.watchers.set(definition.id, watcher);
    }
  }
}
