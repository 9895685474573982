/**
 * Status Watcher
 *
 * Keeps one piece of system state (network, bluetooth, audio, ...) fresh by
 * running a probe command through the command budget.
 *
 * Two modes:
 *   polling       probe every interval plus jitter
 *   event-driven  a long-running watch command prints a line per change;
 *                 each burst of lines triggers one debounced probe. If the
 *                 watch command dies, the watcher falls back to polling.
 *
 * Pausing clears every timer, stops the watch stream and bumps a generation
 * counter so results from probes already in flight are thrown away.
 */

import { WatcherError, getErrorMessage } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import type { CommandBudget, CommandOutcome, CommandStream } from '../commands/command-budget.js';
import type { CommandKind } from '../commands/command-line.js';
import type { OutputParser } from './parsers.js';
import type { WatcherResultWriter } from './watcher-results.js';

export const WATCH_DEBOUNCE_MS = 120;

export interface StatusWatcherDefinition {
  id: string;
  command: string;
  parse: OutputParser;
  intervalMs: number;
  kind: CommandKind;
  timeoutMs?: number;
  watchCommand?: string;
}

export interface StatusWatcherConfig {
  definition: StatusWatcherDefinition;
  budget: CommandBudget;
  writer: WatcherResultWriter;
  debounceMs?: number;
  logger?: Logger;
}

export type StatusWatcherMode = 'paused' | 'polling' | 'streaming';

export class StatusWatcher {
  readonly definition: StatusWatcherDefinition;
  private budget: CommandBudget;
  private writer: WatcherResultWriter;
  private debounceMs: number;
  private logger: Logger;

  private running = false;
  private generation = 0;
  private inFlight = false;
  private pollTimer: ReturnType<typeof setTimeout> | null = null;
  private debounceTimer: ReturnType<typeof setTimeout> | null = null;
  private stream: CommandStream | null = null;

  constructor(config: StatusWatcherConfig) {
    this.definition = config.definition;
    this.budget = config.budget;
    this.writer = config.writer;
    this.debounceMs = config.debounceMs ?? WATCH_DEBOUNCE_MS;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get debug() { return this.logger.debug.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  get id(): string {
    return this.definition.id;
  }

  get mode(): StatusWatcherMode {
    if (!this.running) return 'paused';
    return this.stream ? 'streaming' : 'polling';
  }

  // ----------------------------------------------------------
  // Lifecycle
  // ----------------------------------------------------------

  /** Start (or restart after pause) and probe right away. */
  resume(): void {
    if (this.running) return;
    this.running = true;
    this.generation++;
    if (this.definition.watchCommand) {
      this.startStream(this.definition.watchCommand);
    }
    this.runProbe();
  }

  pause(): void {
    if (!this.running) return;
    this.running = false;
    this.generation++;
    this.clearTimers();
    if (this.stream) {
      const stream = this.stream;
      this.stream = null;
      stream.stop();
    }
    this.debug(`${this.id} paused`);
  }

  // ----------------------------------------------------------
  // Probing
  // ----------------------------------------------------------

  /**
   * Run the probe once and record the result.
   * Resolves to false when the result was discarded or skipped.
   */
  async probe(): Promise<boolean> {
    if (this.inFlight) {
      return false;
    }
    const generation = this.generation;
    this.inFlight = true;
    let outcome: CommandOutcome;
    try {
      outcome = await this.budget.run({
        command: this.definition.command,
        kind: this.definition.kind,
        timeoutMs: this.definition.timeoutMs,
      });
    } finally {
      this.inFlight = false;
    }

    if (generation !== this.generation || !this.running) {
      this.debug(`${this.id} discarded a result from before pause`);
      return false;
    }
    this.record(outcome);
    return true;
  }

  private record(outcome: CommandOutcome): void {
    const error = this.failureOf(outcome);
    if (error) {
      this.writer.markStale(this.id, error.message);
      this.debug(`${this.id} stale: ${error.message}`);
      return;
    }
    if (outcome.status !== 'completed') return;
    try {
      this.writer.publish(this.id, this.definition.parse(outcome.stdout, this.id), outcome.stdout);
    } catch (err) {
      this.writer.markStale(this.id, getErrorMessage(err));
    }
  }

  private failureOf(outcome: CommandOutcome): WatcherError | null {
    switch (outcome.status) {
      case 'completed':
        return outcome.exitCode === 0
          ? null
          : new WatcherError(this.id, 'exit-status', `exited with ${outcome.exitCode ?? outcome.signal}`);
      case 'timed-out':
        return new WatcherError(this.id, 'timed-out', `timed out after ${outcome.timeoutMs}ms`);
      case 'rejected':
        return new WatcherError(this.id, 'rejected', 'command budget exhausted');
      case 'failed':
        return new WatcherError(this.id, 'spawn', outcome.error);
    }
  }

  /** Probe now, then schedule the next poll unless a stream drives us. */
  private runProbe(): void {
    const generation = this.generation;
    this.probe()
      .then(() => {
        if (generation === this.generation && this.running && !this.stream) {
          this.schedulePoll();
        }
      })
      .catch((err: unknown) => {
        this.warn(`${this.id} probe failed: ${getErrorMessage(err)}`);
      });
  }

  private schedulePoll(): void {
    if (this.pollTimer) clearTimeout(this.pollTimer);
    const delay = this.definition.intervalMs + this.budget.jitterFor(this.definition.command, this.definition.kind);
    this.pollTimer = setTimeout(() => {
      this.pollTimer = null;
      this.runProbe();
    }, delay);
  }

  // ----------------------------------------------------------
  // Event-driven mode
  // ----------------------------------------------------------

  private startStream(watchCommand: string): void {
    const generation = this.generation;
    this.stream = this.budget.stream(
      watchCommand,
      () => this.onStreamLine(generation),
      (reason) => this.onStreamExit(generation, reason),
    );
    if (!this.stream) {
      this.warn(`${this.id} watch command unavailable, polling instead`);
    }
  }

  private onStreamLine(generation: number): void {
    if (generation !== this.generation || !this.running) return;
    if (this.debounceTimer) clearTimeout(this.debounceTimer);
    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      this.runProbe();
    }, this.debounceMs);
  }

  private onStreamExit(generation: number, reason: string): void {
    if (generation !== this.generation || !this.running) return;
    this.stream = null;
    this.warn(`${this.id} watch command ${reason}, falling back to polling`);
    this.schedulePoll();
  }

  private clearTimers(): void {
    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }
}
