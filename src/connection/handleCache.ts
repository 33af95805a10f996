/**
 * HandleCache — TTL cache with single-flight fetches
 *
 * One instance per value type (spreadsheet handles, worksheet grids).
 * Concurrent misses for one key share a single fetch; different keys never
 * wait on each other. invalidate() detaches an in-flight fetch so its result
 * is never stored.
 */

import type { CacheEntry, HandleCacheOptions } from "@/types";
import * as logger from "@/logger";

type InFlight<V> = {
  generation: number;
  promise: Promise<V>;
};

export class HandleCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, InFlight<V>>();
  /** Bumped by invalidate(); a fetch started under an older value is not stored */
  private readonly generations = new Map<string, number>();
  private readonly maxEntries?: number;
  private readonly now: () => number;

  constructor(
    private readonly name: string,
    options: HandleCacheOptions = {},
  ) {
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Cached value for key, or the result of fetchFn
   *
   * ttlMs <= 0 disables caching for the call: fetchFn runs and nothing is
   * stored. A failed fetch stores nothing and rejects every waiter.
   */
  getOrFetch(key: string, ttlMs: number, fetchFn: () => Promise<V>): Promise<V> {
    if (ttlMs <= 0) {
      return fetchFn();
    }

    const entry = this.entries.get(key);
    if (entry && this.now() - entry.fetchedAt < ttlMs) {
      logger.debug("Cache hit", { cache: this.name, key });
      return Promise.resolve(entry.value);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug("Joining in-flight fetch", { cache: this.name, key });
      return pending.promise;
    }

    logger.debug("Cache miss", { cache: this.name, key });
    const generation = this.generations.get(key) ?? 0;
    const promise: Promise<V> = Promise.resolve()
      .then(fetchFn)
      .then((value) => {
        if ((this.generations.get(key) ?? 0) === generation) {
          this.store(key, value);
        }
        return value;
      })
      .finally(() => {
        if (this.inFlight.get(key)?.promise === promise) {
          this.inFlight.delete(key);
        }
      });

    this.inFlight.set(key, { generation, promise });
    return promise;
  }

  invalidate(key: string): void {
    this.entries.delete(key);
    this.inFlight.delete(key);
    this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    logger.debug("Cache entry invalidated", { cache: this.name, key });
  }

  clear(): void {
    for (const key of new Set([...this.entries.keys(), ...this.inFlight.keys()])) {
      this.generations.set(key, (this.generations.get(key) ?? 0) + 1);
    }
    this.entries.clear();
    this.inFlight.clear();
  }

  private store(key: string, value: V): void {
    // Re-insert so Map order tracks the freshest write
    this.entries.delete(key);
    this.entries.set(key, { value, fetchedAt: this.now() });

    if (this.maxEntries === undefined) {
      return;
    }
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
