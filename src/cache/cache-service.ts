/**
 * CacheService — the only interface handlers and tasks use to read or write
 * cached values. A pool that does not exist behaves as an always-empty cache:
 * reads miss and writes are dropped, never thrown.
 */
import type { z } from 'zod';
import type { Logger } from '@/observability/logger.js';
import type { CacheRegistry } from './cache-registry.js';
import type { KeySegment } from './cache-keys.js';
import { entityKeyMatcher } from './cache-keys.js';

// ─── Types ──────────────────────────────────────────────────────

export interface CacheServiceOptions {
  registry: CacheRegistry;
  logger: Logger;
}

export interface CacheService {
  /** Cached value if present and unexpired; `undefined` when absent. */
  get(pool: string, key: string): unknown;
  /** Store `value` under the pool's TTL. No-op when the pool does not exist. */
  set(pool: string, key: string, value: unknown): void;
  delete(pool: string, key: string): void;
  /**
   * Remove every key starting with `prefix`; an empty prefix clears the pool.
   * Returns the number of entries removed.
   */
  invalidate(pool: string, prefix?: string): number;
  /** `invalidate` across several pools; returns the total removed. */
  invalidateMulti(pools: readonly string[], prefix?: string): number;
  /** Remove `entity:id` and every `entity:id:...` key built with `cacheKey`. */
  invalidateEntity(pool: string, entity: string, id: KeySegment): number;
  /**
   * Read-through: return the cached value when it satisfies `schema`,
   * otherwise call `load`, cache its result, and return it.
   */
  getOrLoad<T>(
    pool: string,
    key: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    load: () => Promise<T>,
  ): Promise<T>;
}

// ─── Factory ────────────────────────────────────────────────────

/** Create the cache facade over a pool registry. */
export function createCacheService(options: CacheServiceOptions): CacheService {
  const { registry, logger } = options;
  // Bumped by every removal; a load that straddles one is not cached.
  const generations = new Map<string, number>();

  function bump(pool: string): void {
    generations.set(pool, (generations.get(pool) ?? 0) + 1);
  }

  function invalidate(pool: string, prefix = ''): number {
    const store = registry.getPool(pool);
    if (!store) return 0;

    bump(pool);
    const removed = prefix === ''
      ? store.clear()
      : store.deleteWhere((key) => key.startsWith(prefix));

    logger.debug('Cache invalidated', {
      component: 'cache',
      pool,
      prefix,
      removed,
    });
    return removed;
  }

  return {
    get(pool: string, key: string): unknown {
      return registry.getPool(pool)?.get(key);
    },

    set(pool: string, key: string, value: unknown): void {
      registry.getPool(pool)?.set(key, value);
    },

    delete(pool: string, key: string): void {
      bump(pool);
      registry.getPool(pool)?.delete(key);
    },

    invalidate,

    invalidateMulti(pools: readonly string[], prefix = ''): number {
      let total = 0;
      for (const pool of pools) {
        total += invalidate(pool, prefix);
      }
      return total;
    },

    invalidateEntity(pool: string, entity: string, id: KeySegment): number {
      const store = registry.getPool(pool);
      if (!store) return 0;
      bump(pool);
      return store.deleteWhere(entityKeyMatcher(entity, id));
    },

    async getOrLoad<T>(
      pool: string,
      key: string,
      schema: z.ZodType<T, z.ZodTypeDef, unknown>,
      load: () => Promise<T>,
    ): Promise<T> {
      const store = registry.getPool(pool);
      const cached = store?.get(key);

      if (cached !== undefined) {
        const parsed = schema.safeParse(cached);
        if (parsed.success) return parsed.data;

        logger.warn('Cached value failed validation, reloading', {
          component: 'cache',
          pool,
          key,
        });
      }

      const generation = generations.get(pool) ?? 0;
      const fresh = await load();
      if ((generations.get(pool) ?? 0) === generation) {
        store?.set(key, fresh);
      } else {
        logger.debug('Pool invalidated during load, result not cached', {
          component: 'cache',
          pool,
          key,
        });
      }
      return fresh;
    },
  };
}
