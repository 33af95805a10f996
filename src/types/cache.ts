/**
 * HandleCache type definitions
 */

export type CacheEntry<V> = {
  value: V;
  /** Clock reading (ms) when the value was stored */
  fetchedAt: number;
};

export type HandleCacheOptions = {
  /** Oldest entries are evicted beyond this size */
  maxEntries?: number;
  now?: () => number;
};
