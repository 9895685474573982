/**
 * Expiration Scheduler
 *
 * One cancellable timer per notification id. Rescheduling an id replaces
 * its timer, so only the latest deadline ever fires.
 */

import { Urgency } from '@notiflux/core';
import type { Notification, PopupsConfig } from '@notiflux/core';

/** Longest delay setTimeout honours; longer ones fire almost at once. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Milliseconds until a notification expires, or null if it never does.
 *
 * Explicit positive timeouts win. 0 and resident notifications never expire.
 * Otherwise critical notifications use the critical timeout (null = never)
 * and everything else the default timeout.
 */
export function resolveExpiration(
  notification: Pick<Notification, 'expireTimeout' | 'resident' | 'urgency'>,
  popups: PopupsConfig,
): number | null {
  if (notification.resident || notification.expireTimeout === 0) {
    return null;
  }
  if (notification.expireTimeout > 0) {
    return notification.expireTimeout;
  }
  if (notification.urgency === Urgency.Critical) {
    return popups.criticalTimeoutMs;
  }
  return popups.defaultTimeoutMs > 0 ? popups.defaultTimeoutMs : null;
}

export class ExpirationScheduler {
  private timers = new Map<number, ReturnType<typeof setTimeout>>();
  private onExpire: (id: number) => void;

  constructor(onExpire: (id: number) => void) {
    this.onExpire = onExpire;
  }

  /** Arm (or re-arm) the timer for `id`. A null delay just cancels. */
  schedule(id: number, delayMs: number | null): void {
    this.cancel(id);
    if (delayMs === null) {
      return;
    }
    this.arm(id, delayMs);
  }

  /** Delays past the timer limit are waited out in steps. */
  private arm(id: number, remainingMs: number): void {
    const step = Math.min(remainingMs, MAX_TIMER_DELAY_MS);
    const timer = setTimeout(() => {
      if (this.timers.get(id) !== timer) return;
      if (remainingMs > step) {
        this.arm(id, remainingMs - step);
        return;
      }
      this.timers.delete(id);
      this.onExpire(id);
    }, step);
    this.timers.set(id, timer);
  }

  cancel(id: number): boolean {
    const timer = this.timers.get(id);
    if (timer === undefined) {
      return false;
    }
    clearTimeout(timer);
    this.timers.delete(id);
    return true;
  }

  has(id: number): boolean {
    return this.timers.has(id);
  }

  get pending(): number {
    return this.timers.size;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }
}
