/**
 * Structured cache keys.
 *
 * Prefix invalidation only works if every key derived from an entity starts
 * with that entity's identifier. `cacheKey` builds keys as
 * `entity:id[:dimension...]` with each segment URI-encoded, so a segment can
 * never contain the `:` separator. `entityKeyMatcher` matches the bare key and
 * anything under `entity:id:`, but never `entity:id0`.
 */

export type KeySegment = string | number;

const SEPARATOR = ':';

const encode = (segment: KeySegment): string => encodeURIComponent(String(segment));

/** Build `entity:id[:dim...]` with every segment encoded. */
export function cacheKey(entity: string, id: KeySegment, ...dimensions: KeySegment[]): string {
  return [entity, id, ...dimensions].map(encode).join(SEPARATOR);
}

/** Prefix shared by every dimensioned key of one entity, separator included. */
export function entityPrefix(entity: string, id: KeySegment): string {
  return cacheKey(entity, id) + SEPARATOR;
}

/** Predicate matching every key `cacheKey(entity, id, ...)` can produce. */
export function entityKeyMatcher(entity: string, id: KeySegment): (key: string) => boolean {
  const bare = cacheKey(entity, id);
  const prefix = bare + SEPARATOR;
  return (key) => key === bare || key.startsWith(prefix);
}
