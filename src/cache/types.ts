/**
 * Cache pools — named, independently configured TTL stores.
 *
 * Pools live for the process lifetime. Entries are created on miss-then-set,
 * refreshed on set, and removed by delete, prefix invalidation, or expiry.
 * The cache is a disposable view of the database; losing it only costs load.
 */

// ─── Pool Configuration ─────────────────────────────────────────

export interface CachePoolConfig {
  /** Upper bound on stored entries; the least-recently-used entry is evicted first. */
  maxSize: number;
  /** Lifetime of each entry from its last set. */
  ttlSeconds: number;
}

export interface CachePoolDeclaration extends CachePoolConfig {
  name: string;
}

export interface CachePoolStats extends CachePoolDeclaration {
  /** Entries currently held, expired-but-unpurged included. */
  size: number;
}

// ─── Store ──────────────────────────────────────────────────────

/** A bounded, expiring key-value store backing one pool. */
export interface TtlStore {
  readonly maxSize: number;
  readonly ttlMs: number;
  /** Value if present and unexpired; otherwise `undefined`. */
  get(key: string): unknown;
  has(key: string): boolean;
  set(key: string, value: unknown): void;
  delete(key: string): boolean;
  /** Remove every key matching the predicate; returns how many were removed. */
  deleteWhere(predicate: (key: string) => boolean): number;
  clear(): number;
  /** Stored entry count, expired-but-unpurged included. */
  size(): number;
  /** Drop expired entries now; returns how many were dropped. */
  purgeExpired(): number;
  keys(): string[];
}
