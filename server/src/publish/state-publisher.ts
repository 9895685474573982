/**
 * State Publisher
 *
 * Collects StateEvents raised during one event-loop turn and hands them to
 * the sink as a single batch. Within a batch, repeated history, watcher,
 * DND and config-version events collapse into one entry each, keeping the
 * position of the first.
 */

import { getErrorMessage } from '@notiflux/core';
import type { StateEvent, WatcherResultView } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

export type StateEventSink = (events: StateEvent[]) => void;

export interface StatePublisherConfig {
  sink: StateEventSink;
  /** Defers the flush; defaults to setImmediate. */
  schedule?: (flush: () => void) => void;
  logger?: Logger;
}

function union<T>(a: readonly T[], b: readonly T[]): T[] {
  return Array.from(new Set([...a, ...b]));
}

function mergeWatcherResults(a: readonly WatcherResultView[], b: readonly WatcherResultView[]): WatcherResultView[] {
  const byId = new Map<string, WatcherResultView>();
  for (const result of [...a, ...b]) {
    byId.set(result.id, result);
  }
  return Array.from(byId.values());
}

/** Fold `next` into `previous` when both are the same collapsible type. */
export function mergeEvents(previous: StateEvent, next: StateEvent): StateEvent | null {
  if (previous.type === 'history_changed' && next.type === 'history_changed') {
    return {
      type: 'history_changed',
      kinds: union(previous.kinds, next.kinds),
      ids: union(previous.ids, next.ids),
      counts: next.counts,
    };
  }
  if (previous.type === 'watcher_updated' && next.type === 'watcher_updated') {
    return { type: 'watcher_updated', results: mergeWatcherResults(previous.results, next.results) };
  }
  if (previous.type === 'dnd_changed' && next.type === 'dnd_changed') {
    return next;
  }
  if (previous.type === 'config_reloaded' && next.type === 'config_reloaded') {
    return next;
  }
  if (previous.type === 'theme_reloaded' && next.type === 'theme_reloaded') {
    return { type: 'theme_reloaded', assets: union(previous.assets, next.assets) };
  }
  return null;
}

export class StatePublisher {
  private pending: StateEvent[] = [];
  private scheduled = false;
  private stopped = false;
  private sink: StateEventSink;
  private schedule: (flush: () => void) => void;
  private logger: Logger;

  constructor(config: StatePublisherConfig) {
    this.sink = config.sink;
    this.schedule = config.schedule ?? ((flush) => setImmediate(flush));
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  publish(event: StateEvent): void {
    if (this.stopped) return;
    const index = this.pending.findIndex((candidate) => candidate.type === event.type);
    const merged = index === -1 ? null : mergeEvents(this.pending[index], event);
    if (merged) {
      this.pending[index] = merged;
    } else {
      this.pending.push(event);
    }
    if (!this.scheduled) {
      this.scheduled = true;
      this.schedule(() => this.flush());
    }
  }

  /** Send whatever is pending now. */
  flush(): void {
    this.scheduled = false;
    if (this.pending.length === 0) return;
    const batch = this.pending;
    this.pending = [];
    try {
      this.sink(batch);
    } catch (err) {
      this.logger.error(`State sink failed: ${getErrorMessage(err)}`);
    }
  }

  get pendingCount(): number {
    return this.pending.length;
  }

  /** Drop pending events and ignore further publishes. */
  stop(): void {
    this.stopped = true;
    this.pending = [];
  }
}
