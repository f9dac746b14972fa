// Cache module — pool registry, TTL stores, facade, and key helpers
export type {
  CachePoolConfig,
  CachePoolDeclaration,
  CachePoolStats,
  TtlStore,
} from './types.js';

export { createTtlStore } from './ttl-store.js';
export type { TtlStoreOptions } from './ttl-store.js';

export { createCacheRegistry } from './cache-registry.js';
export type { CacheRegistry, CacheRegistryOptions } from './cache-registry.js';

export { CORE_CACHE_POOLS, registerCorePools } from './core-pools.js';
export type { CorePoolName } from './core-pools.js';

export { createCacheService } from './cache-service.js';
export type { CacheService, CacheServiceOptions } from './cache-service.js';

export { cacheKey, entityPrefix, entityKeyMatcher } from './cache-keys.js';
export type { KeySegment } from './cache-keys.js';
