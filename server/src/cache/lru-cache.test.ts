/**
 * Tests for ByteBudgetLru
 */

import { describe, it, expect, beforeEach, jest } from '@jest/globals';
import { CacheComputeError } from '@notiflux/core';
import { ByteBudgetLru } from './lru-cache.js';

describe('ByteBudgetLru', () => {
  let now: number;
  let cache: ByteBudgetLru<string>;

  beforeEach(() => {
    now = 0;
    cache = new ByteBudgetLru<string>({
      budgetBytes: 10,
      sizeOf: (value) => value.length,
      negativeTtlMs: 100,
      maxBackoffMs: 350,
      now: () => now,
    });
  });

  describe('eviction', () => {
    it('evicts the least recently used entries past the byte budget', () => {
      cache.set('a', 'aaaa');
      cache.set('b', 'bbbb');
      expect(cache.get('a')).toBe('aaaa');
      cache.set('c', 'cccc');

      expect(cache.has('a')).toBe(true);
      expect(cache.has('b')).toBe(false);
      expect(cache.has('c')).toBe(true);
      expect(cache.stats()).toMatchObject({ entries: 2, bytes: 8, evictions: 1 });
    });

    it('does not keep a value bigger than the whole budget', () => {
      cache.set('a', 'aaaa');
      expect(cache.set('huge', 'x'.repeat(11))).toBe(false);
      expect(cache.has('huge')).toBe(false);
      expect(cache.has('a')).toBe(true);
    });

    it('replacing a key accounts for the new size', () => {
      cache.set('a', 'aaaa');
      cache.set('a', 'aa');
      expect(cache.stats().bytes).toBe(2);
    });

    it('shrinking the budget evicts at once', () => {
      cache.set('a', 'aaaa');
      cache.set('b', 'bbbb');
      cache.configure({ budgetBytes: 5 });
      expect(cache.has('a')).toBe(false);
      expect(cache.has('b')).toBe(true);
    });
  });

  describe('getOrCompute', () => {
    it('runs one computation for concurrent callers', async () => {
      let release: (value: string) => void = () => undefined;
      const compute = jest.fn(() => new Promise<string>((resolve) => { release = resolve; }));

      const first = cache.getOrCompute('icon', compute);
      const second = cache.getOrCompute('icon', compute);
      release('decoded');

      await expect(Promise.all([first, second])).resolves.toEqual(['decoded', 'decoded']);
      expect(compute).toHaveBeenCalledTimes(1);
      await expect(cache.getOrCompute('icon', compute)).resolves.toBe('decoded');
      expect(compute).toHaveBeenCalledTimes(1);
    });

    it('wraps failures in CacheComputeError', async () => {
      const failure = cache.getOrCompute('bad', () => Promise.reject(new Error('truncated PNG')));
      await expect(failure).rejects.toBeInstanceOf(CacheComputeError);
      await expect(cache.getOrCompute('bad', () => Promise.resolve('x'))).rejects.toThrow('truncated PNG');
    });

    it('backs off exponentially after repeated failures', async () => {
      const compute = jest.fn(() => Promise.reject(new Error('nope')));
      const attempt = () => cache.getOrCompute('bad', compute).catch(() => 'failed');

      await attempt();
      now = 99;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(1);

      now = 100;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(2);

      // second failure at 100: retry after 200 ms
      now = 299;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(2);
      now = 300;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(3);

      // third failure would wait 400 ms, capped at 350
      now = 649;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(3);
      now = 650;
      await attempt();
      expect(compute).toHaveBeenCalledTimes(4);
    });

    it('a success after the backoff clears the failure record', async () => {
      await cache.getOrCompute('k', () => Promise.reject(new Error('once'))).catch(() => undefined);
      now = 100;
      await expect(cache.getOrCompute('k', () => Promise.resolve('ok'))).resolves.toBe('ok');
      expect(cache.stats().failures).toBe(1);
    });

    it('keeps a bounded number of failure records', async () => {
      const capped = new ByteBudgetLru<string>({
        budgetBytes: 10,
        sizeOf: (value) => value.length,
        negativeTtlMs: 100,
        maxFailureRecords: 2,
        now: () => now,
      });
      for (const key of ['a', 'b', 'c']) {
        await capped.getOrCompute(key, () => Promise.reject(new Error('broken'))).catch(() => undefined);
      }
      expect(capped.stats().failureRecords).toBe(2);
      await expect(capped.getOrCompute('a', () => Promise.resolve('A'))).resolves.toBe('A');
      await expect(capped.getOrCompute('c', () => Promise.resolve('C'))).rejects.toThrow('broken');
    });

    it('drops failure records long past their backoff', async () => {
      await cache.getOrCompute('old', () => Promise.reject(new Error('gone'))).catch(() => undefined);
      now = 450;
      await cache.getOrCompute('new', () => Promise.reject(new Error('gone'))).catch(() => undefined);
      expect(cache.stats().failureRecords).toBe(1);
    });

    it('invalidate forgets failures too', async () => {
      await cache.getOrCompute('k', () => Promise.reject(new Error('once'))).catch(() => undefined);
      cache.invalidate('k');
      await expect(cache.getOrCompute('k', () => Promise.resolve('fresh'))).resolves.toBe('fresh');
    });
  });
});
