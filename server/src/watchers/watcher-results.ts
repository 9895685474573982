/**
 * Watcher Results
 *
 * Last-known state of every status watcher. There is exactly one writer,
 * handed to the watcher manager; everything else reads.
 */

import type { WatcherResultView, WatcherValue } from '@notiflux/core';

export interface WatcherResultReader {
  get(id: string): WatcherResultView | null;
  snapshot(): WatcherResultView[];
  subscribe(listener: (updated: WatcherResultView[]) => void): () => void;
}

export interface WatcherResultWriter {
  publish(id: string, value: WatcherValue, raw: string): void;
  /** Keep the last good value but flag it as stale. */
  markStale(id: string, error: string): void;
  remove(id: string): void;
}

export class WatcherResultStore implements WatcherResultReader {
  private results = new Map<string, WatcherResultView>();
  private listeners = new Set<(updated: WatcherResultView[]) => void>();
  private writerIssued = false;
  private now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? Date.now;
  }

  get(id: string): WatcherResultView | null {
    const result = this.results.get(id);
    return result ? { ...result } : null;
  }

  snapshot(): WatcherResultView[] {
    return Array.from(this.results.values(), (result) => ({ ...result }));
  }

  subscribe(listener: (updated: WatcherResultView[]) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Hand out the single writer.
   * @throws Error on a second call
   */
  createWriter(): WatcherResultWriter {
    if (this.writerIssued) {
      throw new Error('watcher results already have a writer');
    }
    this.writerIssued = true;
    return {
      publish: (id, value, raw) => {
        this.set({ id, value, raw, updatedAt: this.now(), stale: false, error: null });
      },
      markStale: (id, error) => {
        const previous = this.results.get(id);
        this.set({
          id,
          value: previous?.value ?? null,
          raw: previous?.raw ?? '',
          updatedAt: previous?.updatedAt ?? null,
          stale: true,
          error,
        });
      },
      remove: (id) => {
        this.results.delete(id);
      },
    };
  }

  private set(result: WatcherResultView): void {
    this.results.set(result.id, result);
    for (const listener of this.listeners) {
      listener([{ ...result }]);
    }
  }
}
