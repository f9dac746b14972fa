/**
 * Bounded TTL store with least-recently-used eviction.
 *
 * Map iteration order doubles as recency order: a hit or a set re-inserts
 * the key at the tail, so the head is always the eviction candidate.
 * Every method is synchronous and never yields, so a single call cannot be
 * interleaved with another flow's mutation of the same store.
 */
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import { ValidationError } from '@/core/errors.js';
import type { CachePoolConfig, TtlStore } from './types.js';

interface Entry {
  value: unknown;
  expiresAt: number;
}

export interface TtlStoreOptions extends CachePoolConfig {
  clock?: Clock;
}

/** Create a bounded, expiring store. */
export function createTtlStore(options: TtlStoreOptions): TtlStore {
  const { maxSize, ttlSeconds, clock = systemClock } = options;

  if (!Number.isInteger(maxSize) || maxSize < 1) {
    throw new ValidationError('Cache pool maxSize must be a positive integer', { maxSize });
  }
  if (!Number.isFinite(ttlSeconds) || ttlSeconds <= 0) {
    throw new ValidationError('Cache pool ttlSeconds must be positive', { ttlSeconds });
  }

  const ttlMs = ttlSeconds * 1000;
  const entries = new Map<string, Entry>();

  const isExpired = (entry: Entry, now: number): boolean => now >= entry.expiresAt;

  function purgeExpired(): number {
    const now = clock.now();
    let removed = 0;
    for (const [key, entry] of entries) {
      if (isExpired(entry, now)) {
        entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  function evictLeastRecentlyUsed(): void {
    const oldest = entries.keys().next();
    if (!oldest.done) {
      entries.delete(oldest.value);
    }
  }

  return {
    maxSize,
    ttlMs,

    get(key: string): unknown {
      const entry = entries.get(key);
      if (!entry) return undefined;

      if (isExpired(entry, clock.now())) {
        entries.delete(key);
        return undefined;
      }

      // Touch: move to the most-recently-used end
      entries.delete(key);
      entries.set(key, entry);
      return entry.value;
    },

    has(key: string): boolean {
      const entry = entries.get(key);
      return entry !== undefined && !isExpired(entry, clock.now());
    },

    set(key: string, value: unknown): void {
      const expiresAt = clock.now() + ttlMs;

      if (entries.has(key)) {
        entries.delete(key);
      } else if (entries.size >= maxSize) {
        purgeExpired();
        while (entries.size >= maxSize) {
          evictLeastRecentlyUsed();
        }
      }

      entries.set(key, { value, expiresAt });
    },

    delete(key: string): boolean {
      return entries.delete(key);
    },

    deleteWhere(predicate: (key: string) => boolean): number {
      const doomed = [...entries.keys()].filter(predicate);
      for (const key of doomed) {
        entries.delete(key);
      }
      return doomed.length;
    },

    clear(): number {
      const count = entries.size;
      entries.clear();
      return count;
    },

    size(): number {
      return entries.size;
    },

    purgeExpired,

    keys(): string[] {
      return [...entries.keys()];
    },
  };
}
