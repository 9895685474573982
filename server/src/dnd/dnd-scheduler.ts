/**
 * DND Scheduler
 *
 * Owns do-not-disturb state. Three effective modes:
 *   off           nothing silences notifications
 *   manual-on     the user switched DND on; sticky until switched off
 *   scheduled-on  a configured time window is active
 *
 * Manual-on wins over the schedule. Switching manual off falls back to
 * whatever the schedule says at that moment. Window membership is
 * re-evaluated on a fixed tick and whenever the config is reloaded.
 */

import type { DndConfig, DndMode, DndRuleContext, DndStatus, DndWindowConfig } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { isWithinAnyWindow } from './time-window.js';

export interface DndSchedulerConfig {
  dnd: DndConfig;
  /** Start in manual-on (general.dndDefault). */
  manualDefault?: boolean;
  onChange?: (status: DndStatus) => void;
  now?: () => Date;
  logger?: Logger;
}

function sameStatus(a: DndStatus, b: DndStatus): boolean {
  return a.mode === b.mode && a.active === b.active && a.manual === b.manual && a.scheduled === b.scheduled;
}

export class DndScheduler {
  private windows: readonly DndWindowConfig[];
  private tickIntervalMs: number;
  private criticalBypass: boolean;
  private manual: boolean;
  private scheduled = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private onChange?: (status: DndStatus) => void;
  private now: () => Date;
  private logger: Logger;

  constructor(config: DndSchedulerConfig) {
    this.windows = config.dnd.windows;
    this.tickIntervalMs = config.dnd.tickIntervalMs;
    this.criticalBypass = config.dnd.criticalBypass;
    this.manual = config.manualDefault ?? false;
    this.onChange = config.onChange;
    this.now = config.now ?? (() => new Date());
    this.logger = config.logger ?? createLogger({ silent: true });
    this.scheduled = isWithinAnyWindow(this.now(), this.windows);
  }

  private get log() { return this.logger.log.bind(this.logger); }

  // ----------------------------------------------------------
  // Lifecycle
  // ----------------------------------------------------------

  start(): void {
    this.stop();
    this.tick();
    this.timer = setInterval(() => this.tick(), this.tickIntervalMs);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Apply reloaded DND settings and re-evaluate immediately. */
  reconfigure(dnd: DndConfig): void {
    const intervalChanged = dnd.tickIntervalMs !== this.tickIntervalMs;
    this.windows = dnd.windows;
    this.tickIntervalMs = dnd.tickIntervalMs;
    this.criticalBypass = dnd.criticalBypass;
    if (this.timer && intervalChanged) {
      this.start();
    } else {
      this.tick();
    }
  }

  /** Re-check window membership. */
  tick(): void {
    this.update(() => {
      this.scheduled = isWithinAnyWindow(this.now(), this.windows);
    });
  }

  // ----------------------------------------------------------
  // Manual control
  // ----------------------------------------------------------

  toggleManual(): DndStatus {
    return this.setManual(!this.manual);
  }

  setManual(enabled: boolean): DndStatus {
    this.update(() => {
      this.manual = enabled;
    });
    return this.status();
  }

  // ----------------------------------------------------------
  // Queries
  // ----------------------------------------------------------

  status(): DndStatus {
    const mode: DndMode = this.manual ? 'manual-on' : this.scheduled ? 'scheduled-on' : 'off';
    return { mode, active: mode !== 'off', manual: this.manual, scheduled: this.scheduled };
  }

  isActive(): boolean {
    return this.manual || this.scheduled;
  }

  ruleContext(): DndRuleContext {
    return { active: this.isActive(), criticalBypass: this.criticalBypass };
  }

  private update(mutate: () => void): void {
    const before = this.status();
    mutate();
    const after = this.status();
    if (!sameStatus(before, after)) {
      this.log(`DND ${before.mode} -> ${after.mode}`);
      this.onChange?.(after);
    }
  }
}
