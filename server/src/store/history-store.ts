/**
 * History Store
 *
 * Single owner of every notification entry and the aggregate counts.
 * Entries are kept in recency order (oldest first in the map); a replace or
 * repeat moves an entry to the most-recent end.
 *
 * All mutations are synchronous, so the event loop serializes them. Readers
 * get copies and never see a half-applied change.
 */

import { CloseReason, Urgency, imageForHistory } from '@notiflux/core';
import type {
  HistoryChangeKind,
  HistoryCounts,
  Notification,
} from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

// ============================================================
// Types
// ============================================================

export const MAX_NOTIFICATION_ID = 0xffffffff;

export interface HistoryChange {
  kind: HistoryChangeKind;
  ids: number[];
  counts: HistoryCounts;
}

export type HistoryFilterState = 'active' | 'history' | 'all';

export interface HistoryFilter {
  /** `active` = open, `history` = closed, `all` = both. Default `all`. */
  state?: HistoryFilterState;
  /** Exact app name. */
  app?: string;
  limit?: number;
}

export interface InsertOutcome {
  notification: Notification;
  replaced: boolean;
  deduplicated: boolean;
  /** Entries dropped to stay within capacity, as they were before removal. */
  evicted: Notification[];
}

export type DismissOutcome =
  | { action: 'closed'; notification: Notification }
  | { action: 'removed'; notification: Notification };

export interface HistoryStoreConfig {
  capacity: number;
  dedupWindowMs: number;
  transientToHistory: boolean;
  /** Called before an entry is dropped for capacity. */
  onEvict?: (entry: Notification) => void;
  onChange?: (change: HistoryChange) => void;
  now?: () => number;
  logger?: Logger;
}

// ============================================================
// Store
// ============================================================

export class HistoryStore {
  private entries = new Map<number, Notification>();
  private nextId = 1;
  private capacity: number;
  private dedupWindowMs: number;
  private transientToHistory: boolean;
  private onEvict?: (entry: Notification) => void;
  private onChange?: (change: HistoryChange) => void;
  private now: () => number;
  private logger: Logger;

  constructor(config: HistoryStoreConfig) {
    this.capacity = Math.max(1, config.capacity);
    this.dedupWindowMs = config.dedupWindowMs;
    this.transientToHistory = config.transientToHistory;
    this.onEvict = config.onEvict;
    this.onChange = config.onChange;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger({ silent: true });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get debug() { return this.logger.debug.bind(this.logger); }

  // ----------------------------------------------------------
  // Settings
  // ----------------------------------------------------------

  /** Apply reloaded history settings. Shrinking evicts immediately. */
  configure(settings: { capacity: number; dedupWindowMs: number; transientToHistory: boolean }): void {
    this.capacity = Math.max(1, settings.capacity);
    this.dedupWindowMs = settings.dedupWindowMs;
    this.transientToHistory = settings.transientToHistory;
    this.evictIfOverCapacity();
  }

  setCapacity(capacity: number): void {
    this.capacity = Math.max(1, capacity);
    this.evictIfOverCapacity();
  }

  getCapacity(): number {
    return this.capacity;
  }

  // ----------------------------------------------------------
  // Ids
  // ----------------------------------------------------------

  /**
   * Next free id. Wraps at u32 max, never returns 0 and skips ids that are
   * still present in the store.
   */
  allocateId(): number {
    for (let attempts = 0; attempts <= this.entries.size; attempts++) {
      const candidate = this.nextId;
      this.nextId = candidate >= MAX_NOTIFICATION_ID ? 1 : candidate + 1;
      if (!this.entries.has(candidate)) {
        return candidate;
      }
    }
    // Unreachable while capacity is far below the id space.
    throw new Error('notification id space exhausted');
  }

  // ----------------------------------------------------------
  // Mutations
  // ----------------------------------------------------------

  /**
   * Insert a new notification, replace an open one in place, or fold an
   * identical recent notification into a repeat.
   */
  insertOrReplace(notification: Notification, replacesId = 0): InsertOutcome {
    const now = this.now();

    const target = replacesId > 0 ? this.entries.get(replacesId) : undefined;
    if (target && !target.closed) {
      const updated: Notification = {
        ...notification,
        id: target.id,
        receivedAt: target.receivedAt,
        updatedAt: now,
        repeatCount: 1,
        unread: true,
        closed: false,
        closeReason: null,
      };
      this.moveToFront(updated);
      this.emit('replaced', [updated.id]);
      return { notification: { ...updated }, replaced: true, deduplicated: false, evicted: [] };
    }

    const duplicate = replacesId > 0 ? undefined : this.findDuplicate(notification, now);
    if (duplicate) {
      const repeated: Notification = {
        ...duplicate,
        repeatCount: duplicate.repeatCount + 1,
        updatedAt: now,
        unread: true,
      };
      this.moveToFront(repeated);
      this.debug(`Folded repeat into #${repeated.id} (x${repeated.repeatCount})`);
      this.emit('repeated', [repeated.id]);
      return { notification: { ...repeated }, replaced: false, deduplicated: true, evicted: [] };
    }

    const id = this.allocateId();
    const inserted: Notification = {
      ...notification,
      id,
      receivedAt: now,
      updatedAt: now,
      closed: false,
      closeReason: null,
    };
    this.entries.set(id, inserted);
    this.emit('added', [id]);
    const evicted = this.evictIfOverCapacity();
    return { notification: { ...inserted }, replaced: false, deduplicated: false, evicted };
  }

  /**
   * Mark an open entry closed. Transient entries leave history on close
   * unless configured otherwise.
   *
   * @returns the closed entry, or null when the id is unknown or already closed
   */
  close(id: number, reason: CloseReason): Notification | null {
    const entry = this.entries.get(id);
    if (!entry || entry.closed) {
      return null;
    }
    const closed: Notification = {
      ...entry,
      closed: true,
      closeReason: reason,
      image: imageForHistory(entry.image),
    };
    if (entry.transient && !this.transientToHistory) {
      this.entries.delete(id);
      this.emit('removed', [id]);
    } else {
      this.entries.set(id, closed);
      this.emit('closed', [id]);
    }
    return { ...closed };
  }

  /**
   * User dismissal: an open entry is closed, a closed one leaves history.
   * @returns what happened, or null for an unknown id
   */
  dismiss(id: number): DismissOutcome | null {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    if (entry.closed) {
      this.entries.delete(id);
      this.emit('removed', [id]);
      return { action: 'removed', notification: { ...entry } };
    }
    const closed = this.close(id, CloseReason.Dismissed);
    return closed ? { action: 'closed', notification: closed } : null;
  }

  /**
   * Remove an entry outright.
   * @returns the removed entry, or null when unknown
   */
  remove(id: number): Notification | null {
    const entry = this.entries.get(id);
    if (!entry) {
      return null;
    }
    this.entries.delete(id);
    this.emit('removed', [id]);
    return { ...entry };
  }

  /**
   * Remove every entry matching the predicate (all entries by default).
   * @returns the removed entries, oldest first
   */
  clear(predicate: (entry: Notification) => boolean = () => true): Notification[] {
    const removed: Notification[] = [];
    for (const entry of this.entries.values()) {
      if (predicate(entry)) {
        removed.push({ ...entry });
      }
    }
    for (const entry of removed) {
      this.entries.delete(entry.id);
    }
    if (removed.length > 0) {
      this.log(`Cleared ${removed.length} entries`);
      this.emit('cleared', removed.map((entry) => entry.id));
    }
    return removed;
  }

  /**
   * Drop entries until size is within capacity: oldest closed first, then
   * the oldest entry of any state.
   */
  evictIfOverCapacity(): Notification[] {
    const evicted: Notification[] = [];
    while (this.entries.size > this.capacity) {
      const victim = this.pickEvictionVictim();
      if (!victim) break;
      this.onEvict?.({ ...victim });
      this.entries.delete(victim.id);
      evicted.push({ ...victim });
    }
    if (evicted.length > 0) {
      this.debug(`Evicted ${evicted.length} entries (capacity ${this.capacity})`);
      this.emit('evicted', evicted.map((entry) => entry.id));
    }
    return evicted;
  }

  /** The panel was shown: everything currently held counts as seen. */
  markAllSeen(): number {
    const seen: number[] = [];
    for (const [id, entry] of this.entries) {
      if (entry.unread) {
        this.entries.set(id, { ...entry, unread: false });
        seen.push(id);
      }
    }
    if (seen.length > 0) {
      this.emit('seen', seen);
    }
    return seen.length;
  }

  // ----------------------------------------------------------
  // Queries
  // ----------------------------------------------------------

  get(id: number): Notification | null {
    const entry = this.entries.get(id);
    return entry ? { ...entry } : null;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  isOpen(id: number): boolean {
    const entry = this.entries.get(id);
    return entry !== undefined && !entry.closed;
  }

  /** Entries matching the filter, newest first. */
  list(filter: HistoryFilter = {}): Notification[] {
    const state = filter.state ?? 'all';
    const result: Notification[] = [];
    const ordered = Array.from(this.entries.values()).reverse();
    for (const entry of ordered) {
      if (state === 'active' && entry.closed) continue;
      if (state === 'history' && !entry.closed) continue;
      if (filter.app !== undefined && entry.appName !== filter.app) continue;
      result.push({ ...entry });
      if (filter.limit !== undefined && result.length >= filter.limit) break;
    }
    return result;
  }

  counts(): HistoryCounts {
    let active = 0;
    let unread = 0;
    let criticalActive = 0;
    for (const entry of this.entries.values()) {
      if (!entry.closed) {
        active++;
        if (entry.unread) unread++;
        if (entry.urgency === Urgency.Critical) criticalActive++;
      }
    }
    return { total: this.entries.size, active, unread, criticalActive };
  }

  get size(): number {
    return this.entries.size;
  }

  // ----------------------------------------------------------
  // Persistence support
  // ----------------------------------------------------------

  /** All entries, oldest first. */
  exportEntries(): Notification[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  /**
   * Load persisted entries (oldest first) into an empty store and continue
   * id allocation after the highest restored id.
   */
  restore(entries: readonly Notification[]): void {
    let highest = 0;
    for (const entry of entries) {
      this.entries.set(entry.id, { ...entry });
      highest = Math.max(highest, entry.id);
    }
    if (highest > 0) {
      this.nextId = highest >= MAX_NOTIFICATION_ID ? 1 : highest + 1;
    }
    this.evictIfOverCapacity();
  }

  // ----------------------------------------------------------
  // Internal
  // ----------------------------------------------------------

  private moveToFront(entry: Notification): void {
    this.entries.delete(entry.id);
    this.entries.set(entry.id, entry);
  }

  private findDuplicate(notification: Notification, now: number): Notification | undefined {
    if (this.dedupWindowMs <= 0) return undefined;
    for (const entry of this.entries.values()) {
      if (
        !entry.closed &&
        entry.appName === notification.appName &&
        entry.summary === notification.summary &&
        entry.body === notification.body &&
        now - entry.updatedAt <= this.dedupWindowMs
      ) {
        return entry;
      }
    }
    return undefined;
  }

  private pickEvictionVictim(): Notification | undefined {
    let oldest: Notification | undefined;
    for (const entry of this.entries.values()) {
      if (entry.closed) return entry;
      if (!oldest) oldest = entry;
    }
    return oldest;
  }

  private emit(kind: HistoryChangeKind, ids: number[]): void {
    this.onChange?.({ kind, ids, counts: this.counts() });
  }
}
