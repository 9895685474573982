/**
 * Notification Server
 *
 * The protocol front door, independent of the bus it is exported on.
 * Turns Notify calls into history entries (or deliberate silence), owns the
 * expiry timers, and raises the two protocol signals.
 *
 * Flow for one Notify:
 *   build record -> rules -> [suppressed? id only] -> [DND? id only]
 *   -> store.insertOrReplace -> expiry timer -> sound -> notification_added
 */

import {
  BASE_CAPABILITIES,
  CloseReason,
  DND_BYPASS_HINT,
  NotFoundError,
  ProtocolError,
  SERVER_NAME,
  SERVER_VENDOR,
  SOUND_CAPABILITY,
  PROTOCOL_VERSION,
  applyVerdict,
  buildNotification,
  evaluateRules,
  getErrorMessage,
  hintBool,
  logSnippet,
} from '@notiflux/core';
import type {
  ConfigSnapshot,
  DndRuleContext,
  HistoryConfig,
  Notification,
  NotifyRequest,
  Verdict,
} from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';
import { ExpirationScheduler, resolveExpiration } from '../expiry/expiration-scheduler.js';
import { HistoryStore, MAX_NOTIFICATION_ID } from '../store/history-store.js';
import type { HistoryChange } from '../store/history-store.js';
import type { PlayResult } from '../sound/sound-player.js';

// ============================================================
// Types
// ============================================================

export interface ServerInformation {
  name: string;
  vendor: string;
  version: string;
  specVersion: string;
}

export type ServerSignal =
  | { type: 'notification_closed'; id: number; reason: CloseReason }
  | { type: 'action_invoked'; id: number; actionKey: string }
  | {
      type: 'notification_added';
      notification: Notification;
      replaced: boolean;
      deduplicated: boolean;
      /** False when a rule asked for no popup. */
      popup: boolean;
    };

/** What the server needs from the DND scheduler. */
export interface DndSource {
  ruleContext(): DndRuleContext;
}

/** What the server needs from the config store. */
export interface SnapshotSource {
  current(): ConfigSnapshot;
}

export interface SoundSink {
  supportsSound(): boolean;
  playFor(notification: Notification, allowed?: boolean): Promise<PlayResult>;
}

export interface NotificationServerConfig {
  config: SnapshotSource;
  dnd: DndSource;
  version: string;
  sound?: SoundSink;
  onSignal?: (signal: ServerSignal) => void;
  onHistoryChange?: (change: HistoryChange) => void;
  now?: () => number;
  logger?: Logger;
}

export type NotifyOutcome = 'accepted' | 'replaced' | 'repeated' | 'suppressed' | 'dnd-blocked';

function validateRequest(request: NotifyRequest): void {
  const { replacesId, expireTimeout } = request;
  if (!Number.isInteger(replacesId) || replacesId < 0 || replacesId > MAX_NOTIFICATION_ID) {
    throw new ProtocolError(`replaces_id out of range: ${replacesId}`);
  }
  if (!Number.isInteger(expireTimeout)) {
    throw new ProtocolError(`expire_timeout is not an integer: ${expireTimeout}`);
  }
}

// ============================================================
// Server
// ============================================================

export class NotificationServer {
  readonly history: HistoryStore;
  private config: SnapshotSource;
  private dnd: DndSource;
  private version: string;
  private sound?: SoundSink;
  private onSignal?: (signal: ServerSignal) => void;
  private expiry: ExpirationScheduler;
  private capabilities: string[];
  private now: () => number;
  private logger: Logger;
  private lastOutcome: NotifyOutcome | null = null;

  constructor(config: NotificationServerConfig) {
    this.config = config.config;
    this.dnd = config.dnd;
    this.version = config.version;
    this.sound = config.sound;
    this.onSignal = config.onSignal;
    this.now = config.now ?? Date.now;
    this.logger = config.logger ?? createLogger({ silent: true });
    this.expiry = new ExpirationScheduler((id) => this.closeWith(id, CloseReason.Expired));

    // Fixed for the life of the process; reloads never change the answer.
    this.capabilities = [...BASE_CAPABILITIES];
    if (this.sound?.supportsSound()) {
      this.capabilities.push(SOUND_CAPABILITY);
    }

    const history = this.config.current().config.history;
    this.history = new HistoryStore({
      capacity: history.maxEntries,
      dedupWindowMs: history.dedupWindowMs,
      transientToHistory: history.transientToHistory,
      onEvict: (entry) => this.handleEvicted(entry),
      onChange: config.onHistoryChange,
      now: this.now,
      logger: this.logger,
    });
  }

  private get log() { return this.logger.log.bind(this.logger); }
  private get debug() { return this.logger.debug.bind(this.logger); }
  private get warn() { return this.logger.warn.bind(this.logger); }

  // ----------------------------------------------------------
  // Protocol methods
  // ----------------------------------------------------------

  /**
   * Handle a Notify call.
   * @returns the id the sender should use for this notification
   * @throws ProtocolError for out-of-range arguments
   */
  notify(request: NotifyRequest): number {
    validateRequest(request);
    const snapshot = this.config.current();
    const base = buildNotification(request, this.now());
    const verdict = evaluateRules(base, snapshot.rules, this.dnd.ruleContext());

    if (verdict.suppress) {
      const id = this.history.allocateId();
      this.lastOutcome = 'suppressed';
      this.debug(`#${id} suppressed by ${verdict.matched.join(', ')}: ${logSnippet(base.summary)}`);
      return id;
    }

    const notification = applyVerdict(base, verdict);
    if (this.isHeldByDnd(notification, verdict)) {
      const id = this.history.allocateId();
      this.lastOutcome = 'dnd-blocked';
      this.debug(`#${id} held by do-not-disturb: ${logSnippet(notification.summary)}`);
      return id;
    }

    const outcome = this.history.insertOrReplace(notification, request.replacesId);
    const entry = outcome.notification;
    this.lastOutcome = outcome.replaced ? 'replaced' : outcome.deduplicated ? 'repeated' : 'accepted';
    this.expiry.schedule(entry.id, resolveExpiration(entry, snapshot.config.popups));

    this.sound?.playFor(entry, true).catch((err: unknown) => {
      this.warn(`Sound for #${entry.id} failed: ${getErrorMessage(err)}`);
    });

    this.onSignal?.({
      type: 'notification_added',
      notification: entry,
      replaced: outcome.replaced,
      deduplicated: outcome.deduplicated,
      popup: !entry.suppressPopup,
    });
    this.debug(`#${entry.id} ${this.lastOutcome} from ${entry.appName}: ${logSnippet(entry.summary)}`);
    return entry.id;
  }

  /** CloseNotification: unknown or already closed ids are ignored. */
  closeNotification(id: number): boolean {
    return this.closeWith(id, CloseReason.ClosedByCall);
  }

  getCapabilities(): string[] {
    return [...this.capabilities];
  }

  getServerInformation(): ServerInformation {
    return { name: SERVER_NAME, vendor: SERVER_VENDOR, version: this.version, specVersion: PROTOCOL_VERSION };
  }

  // ----------------------------------------------------------
  // Control-side operations
  // ----------------------------------------------------------

  /**
   * User dismissal. An open entry closes with reason dismissed; dismissing a
   * closed entry removes it from history.
   */
  dismiss(id: number): boolean {
    this.expiry.cancel(id);
    const outcome = this.history.dismiss(id);
    if (!outcome) {
      return false;
    }
    if (outcome.action === 'closed') {
      this.onSignal?.({ type: 'notification_closed', id, reason: CloseReason.Dismissed });
    }
    return true;
  }

  /**
   * Emit ActionInvoked for an open entry, then close it unless resident.
   * @throws NotFoundError when the entry is not open or has no such action
   */
  invokeAction(id: number, actionKey: string): void {
    const entry = this.history.get(id);
    if (!entry || entry.closed) {
      throw new NotFoundError(`notification ${id} is not open`);
    }
    if (!entry.actions.some((action) => action.key === actionKey)) {
      throw new NotFoundError(`notification ${id} has no action "${actionKey}"`);
    }
    this.onSignal?.({ type: 'action_invoked', id, actionKey });
    if (!entry.resident) {
      this.closeWith(id, CloseReason.Dismissed);
    }
  }

  /**
   * Close every open entry as dismissed, then empty history.
   * @returns how many entries were held before clearing
   */
  clearAll(): number {
    const held = this.history.size;
    for (const entry of this.history.list({ state: 'active' })) {
      this.closeWith(entry.id, CloseReason.Dismissed);
    }
    this.history.clear();
    this.log(`Cleared history (${held} entries)`);
    return held;
  }

  applyHistoryConfig(history: HistoryConfig): void {
    this.history.configure({
      capacity: history.maxEntries,
      dedupWindowMs: history.dedupWindowMs,
      transientToHistory: history.transientToHistory,
    });
  }

  /** Outcome of the most recent Notify, for diagnostics and tests. */
  getLastOutcome(): NotifyOutcome | null {
    return this.lastOutcome;
  }

  get pendingExpirations(): number {
    return this.expiry.pending;
  }

  shutdown(): void {
    this.expiry.cancelAll();
  }

  // ----------------------------------------------------------
  // Internals
  // ----------------------------------------------------------

  private isHeldByDnd(notification: Notification, verdict: Verdict): boolean {
    return verdict.dndBlocked && !hintBool(notification.hints, DND_BYPASS_HINT);
  }

  private closeWith(id: number, reason: CloseReason): boolean {
    this.expiry.cancel(id);
    const closed = this.history.close(id, reason);
    if (!closed) {
      return false;
    }
    this.onSignal?.({ type: 'notification_closed', id, reason });
    return true;
  }

  private handleEvicted(entry: Notification): void {
    this.expiry.cancel(entry.id);
    if (!entry.closed) {
      this.onSignal?.({ type: 'notification_closed', id: entry.id, reason: CloseReason.Undefined });
    }
  }
}
