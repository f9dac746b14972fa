/**
 * Platform-level pools, registered unconditionally at startup.
 *
 * TTLs bound how stale each data class may get: membership and auth
 * lookups turn over fastest, pricing plans hardly ever.
 * Dashboards (`analytics`) are derived views and may be shorter still.
 */
import type { CacheRegistry } from './cache-registry.js';
import type { CachePoolDeclaration } from './types.js';

export const CORE_CACHE_POOLS = [
  { name: 'auth', maxSize: 512, ttlSeconds: 60 },
  { name: 'org', maxSize: 256, ttlSeconds: 120 },
  { name: 'catalog', maxSize: 256, ttlSeconds: 120 },
  { name: 'plans', maxSize: 32, ttlSeconds: 600 },
  { name: 'analytics', maxSize: 256, ttlSeconds: 30 },
  { name: 'reports', maxSize: 128, ttlSeconds: 60 },
] as const satisfies readonly CachePoolDeclaration[];

export type CorePoolName = (typeof CORE_CACHE_POOLS)[number]['name'];

/** Register the core pools; returns the names that were newly created. */
export function registerCorePools(registry: CacheRegistry): CorePoolName[] {
  const created: CorePoolName[] = [];
  for (const { name, maxSize, ttlSeconds } of CORE_CACHE_POOLS) {
    if (registry.registerPool(name, { maxSize, ttlSeconds })) {
      created.push(name);
    }
  }
  return created;
}
