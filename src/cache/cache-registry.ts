/**
 * CacheRegistry — owns the set of named pools and their configuration.
 *
 * Registration is first-wins: a second `registerPool` for an existing name
 * leaves the original pool untouched, so feature modules can declare pools
 * without coordinating with each other or with the core set.
 */
import type { Clock } from '@/core/clock.js';
import { systemClock } from '@/core/clock.js';
import type { Logger } from '@/observability/logger.js';
import { createTtlStore } from './ttl-store.js';
import type { CachePoolConfig, CachePoolStats, TtlStore } from './types.js';

// ─── Types ──────────────────────────────────────────────────────

export interface CacheRegistryOptions {
  logger: Logger;
  clock?: Clock;
}

export interface CacheRegistry {
  /** Create a pool; returns false (and changes nothing) if the name is taken. */
  registerPool(name: string, config: CachePoolConfig): boolean;
  getPool(name: string): TtlStore | undefined;
  hasPool(name: string): boolean;
  poolNames(): string[];
  stats(): CachePoolStats[];
}

// ─── Factory ────────────────────────────────────────────────────

/** Create an empty pool registry. */
export function createCacheRegistry(options: CacheRegistryOptions): CacheRegistry {
  const { logger, clock = systemClock } = options;
  const pools = new Map<string, { store: TtlStore; config: CachePoolConfig }>();

  return {
    registerPool(name: string, config: CachePoolConfig): boolean {
      if (pools.has(name)) {
        logger.debug('Cache pool already registered, keeping first', {
          component: 'cache-registry',
          pool: name,
        });
        return false;
      }

      pools.set(name, {
        store: createTtlStore({ ...config, clock }),
        config: { maxSize: config.maxSize, ttlSeconds: config.ttlSeconds },
      });

      logger.debug('Registered cache pool', {
        component: 'cache-registry',
        pool: name,
        maxSize: config.maxSize,
        ttlSeconds: config.ttlSeconds,
      });
      return true;
    },

    getPool(name: string): TtlStore | undefined {
      return pools.get(name)?.store;
    },

    hasPool(name: string): boolean {
      return pools.has(name);
    },

    poolNames(): string[] {
      return [...pools.keys()];
    },

    stats(): CachePoolStats[] {
      return [...pools.entries()].map(([name, { store, config }]) => ({
        name,
        maxSize: config.maxSize,
        ttlSeconds: config.ttlSeconds,
        size: store.size(),
      }));
    },
  };
}
