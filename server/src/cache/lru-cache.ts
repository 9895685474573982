/**
 * Byte-budgeted LRU cache
 *
 * Shared shape of the icon and theme caches:
 * - least-recently-used eviction once the resident bytes exceed the budget
 * - single-flight computation per key
 * - failed computations are remembered and retried with exponential backoff
 */

import { CacheComputeError, getErrorMessage } from '@notiflux/core';
import type { Logger } from '../logging/logger-factory.js';
import { createLogger } from '../logging/logger-factory.js';

/** Failure records kept per cache; the oldest go first. */
export const DEFAULT_MAX_FAILURE_RECORDS = 256;

// ============================================================
// Types
// ============================================================

interface Entry<T> {
  value: T;
  bytes: number;
}

interface NegativeEntry {
  error: CacheComputeError;
  failures: number;
  retryAt: number;
}

export interface ByteBudgetLruOptions<T> {
  budgetBytes: number;
  sizeOf: (value: T) => number;
  /** First retry delay after a failure; doubles per consecutive failure. */
  negativeTtlMs?: number;
  maxBackoffMs?: number;
  maxFailureRecords?: number;
  name?: string;
  now?: () => number;
  logger?: Logger;
}

export interface CacheStats {
  entries: number;
  bytes: number;
  budgetBytes: number;
  hits: number;
  misses: number;
  evictions: number;
  failures: number;
  failureRecords: number;
}

// ============================================================
// Cache
// ============================================================

export class ByteBudgetLru<T> {
  /** Map iteration order is the recency order, oldest first. */
  private readonly entries = new Map<string, Entry<T>>();
  private readonly negative = new Map<string, NegativeEntry>();
  private readonly pending = new Map<string, Promise<T>>();
  private readonly sizeOf: (value: T) => number;
  private readonly name: string;
  private readonly now: () => number;
  private readonly logger: Logger;
  private budgetBytes: number;
  private negativeTtlMs: number;
  private maxBackoffMs: number;
  private readonly maxFailureRecords: number;
  private totalBytes = 0;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private failures = 0;

  constructor(options: ByteBudgetLruOptions<T>) {
    this.budgetBytes = Math.max(0, options.budgetBytes);
    this.sizeOf = options.sizeOf;
    this.negativeTtlMs = options.negativeTtlMs ?? 1000;
    this.maxBackoffMs = options.maxBackoffMs ?? 60_000;
    this.maxFailureRecords = Math.max(1, options.maxFailureRecords ?? DEFAULT_MAX_FAILURE_RECORDS);
    this.name = options.name ?? 'cache';
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ silent: true });
  }

  private get debug() { return this.logger.debug.bind(this.logger); }

  /**
   * Cached value for `key`, computing it at most once at a time.
   * @throws CacheComputeError while the key is backing off after a failure
   */
  getOrCompute(key: string, compute: () => Promise<T>): Promise<T> {
    const hit = this.get(key);
    if (hit !== undefined) {
      return Promise.resolve(hit);
    }

    const failed = this.negative.get(key);
    if (failed && this.now() < failed.retryAt) {
      return Promise.reject(failed.error);
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      return inFlight;
    }

    const computation = compute().then(
      (value) => {
        this.pending.delete(key);
        this.negative.delete(key);
        this.set(key, value);
        return value;
      },
      (err: unknown) => {
        this.pending.delete(key);
        throw this.recordFailure(key, err);
      },
    );
    this.pending.set(key, computation);
    return computation;
  }

  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    // Re-insert to mark as most recently used.
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.value;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * Store a value. A value larger than the whole budget is not kept.
   * @returns whether the value is now resident
   */
  set(key: string, value: T): boolean {
    const bytes = this.sizeOf(value);
    this.delete(key);
    if (bytes > this.budgetBytes) {
      this.debug(`${this.name}: ${key} (${bytes} bytes) exceeds the budget, not cached`);
      return false;
    }
    this.entries.set(key, { value, bytes });
    this.totalBytes += bytes;
    this.evictToBudget();
    return true;
  }

  invalidate(key: string): boolean {
    this.negative.delete(key);
    return this.delete(key);
  }

  /** Drop every entry, including remembered failures. */
  clear(): void {
    this.entries.clear();
    this.negative.clear();
    this.totalBytes = 0;
  }

  configure(options: { budgetBytes?: number; negativeTtlMs?: number; maxBackoffMs?: number }): void {
    if (options.budgetBytes !== undefined) this.budgetBytes = Math.max(0, options.budgetBytes);
    if (options.negativeTtlMs !== undefined) this.negativeTtlMs = options.negativeTtlMs;
    if (options.maxBackoffMs !== undefined) this.maxBackoffMs = options.maxBackoffMs;
    this.evictToBudget();
  }

  stats(): CacheStats {
    return {
      entries: this.entries.size,
      bytes: this.totalBytes,
      budgetBytes: this.budgetBytes,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      failures: this.failures,
      failureRecords: this.negative.size,
    };
  }

  // ----------------------------------------------------------
  // Internals
  // ----------------------------------------------------------

  private delete(key: string): boolean {
    const entry = this.entries.get(key);
    if (!entry) return false;
    this.entries.delete(key);
    this.totalBytes -= entry.bytes;
    return true;
  }

  private evictToBudget(): void {
    for (const [key, entry] of this.entries) {
      if (this.totalBytes <= this.budgetBytes) break;
      this.entries.delete(key);
      this.totalBytes -= entry.bytes;
      this.evictions++;
    }
  }

  private recordFailure(key: string, err: unknown): CacheComputeError {
    const error =
      err instanceof CacheComputeError ? err : new CacheComputeError(key, getErrorMessage(err), { cause: err });
    const failures = (this.negative.get(key)?.failures ?? 0) + 1;
    const backoff = Math.min(this.negativeTtlMs * 2 ** (failures - 1), this.maxBackoffMs);
    const now = this.now();
    this.negative.delete(key);
    this.negative.set(key, { error, failures, retryAt: now + backoff });
    this.pruneFailures(now);
    this.failures++;
    this.debug(`${this.name}: ${key} failed (${failures}x), retry in ${backoff}ms: ${error.message}`);
    return error;
  }

  /**
   * Forget failures whose backoff ended a full backoff period ago, then the
   * oldest records past the cap. Insertion order is recording order.
   */
  private pruneFailures(now: number): void {
    for (const [key, record] of this.negative) {
      if (record.retryAt + this.maxBackoffMs <= now) this.negative.delete(key);
    }
    for (const key of this.negative.keys()) {
      if (this.negative.size <= this.maxFailureRecords) break;
      this.negative.delete(key);
    }
  }
}
