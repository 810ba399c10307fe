/**
 * TTL cache in front of the stat source
 * Fresh entries are served without a fetch, concurrent misses for one key share a single fetch,
 * and when a fetch fails the last known good payload is served as stale
 */

import { CacheMissError, getErrorMessage } from './errors';
import { MemoryCacheStore, type CacheEntry, type CacheStore } from './cacheStores';
import { RequestDeduplicator } from './requestDeduplication';
import { createLogger } from './logger';

const log = createLogger('Stat Cache');

export interface CacheResult<T> {
  payload: T;
  isStale: boolean;
  /** Epoch seconds when the payload was fetched. */
  fetchedAt: number;
}

export interface CacheGetOptions {
  /** Skip the freshness check and fetch; stale fallback still applies. */
  forceRefresh?: boolean;
}

export interface TtlCacheOptions<T> {
  store?: CacheStore<T>;
  /** Default retention window for purge(), in seconds. */
  maxRetentionSeconds?: number;
  /** Clock in epoch milliseconds. */
  now?: () => number;
}

export function isFresh(entry: CacheEntry<unknown>, nowSeconds: number): boolean {
  return nowSeconds - entry.fetchedAt < entry.ttl;
}

export class TtlCache<T> {
  private readonly store: CacheStore<T>;
  private readonly inflight = new RequestDeduplicator();
  private readonly maxRetentionSeconds: number;
  private readonly now: () => number;

  constructor(options: TtlCacheOptions<T> = {}) {
    this.store = options.store ?? new MemoryCacheStore<T>();
    this.maxRetentionSeconds = options.maxRetentionSeconds ?? 7 * 24 * 60 * 60;
    this.now = options.now ?? Date.now;
  }

  private nowSeconds(): number {
    return this.now() / 1000;
  }

  /**
   * Return the cached payload for key, fetching it when missing or expired.
   * Throws CacheMissError only when the fetch fails and nothing of any age is cached.
   */
  async get(
    key: string,
    ttlSeconds: number,
    fetchFn: () => Promise<T>,
    options: CacheGetOptions = {}
  ): Promise<CacheResult<T>> {
    if (!options.forceRefresh) {
      const entry = await this.store.get(key);
      if (entry && isFresh(entry, this.nowSeconds())) {
        log.debug(`HIT ${key}`);
        return { payload: entry.payload, isStale: false, fetchedAt: entry.fetchedAt };
      }
    }

    return this.inflight.dedupe(key, () => this.refresh(key, ttlSeconds, fetchFn));
  }

  private async refresh(key: string, ttlSeconds: number, fetchFn: () => Promise<T>): Promise<CacheResult<T>> {
    log.debug(`MISS ${key}, fetching`);
    let payload: T;
    try {
      payload = await fetchFn();
    } catch (error) {
      const previous = await this.store.get(key);
      if (previous) {
        log.warn(`Fetch failed for ${key}, serving stale data from ${new Date(previous.fetchedAt * 1000).toISOString()}`, getErrorMessage(error));
        return { payload: previous.payload, isStale: true, fetchedAt: previous.fetchedAt };
      }
      log.warn(`Fetch failed for ${key} with nothing cached`, getErrorMessage(error));
      throw new CacheMissError(key, error);
    }

    const entry: CacheEntry<T> = { key, payload, fetchedAt: this.nowSeconds(), ttl: ttlSeconds };
    try {
      await this.store.set(entry);
      log.debug(`SET ${key} (TTL: ${ttlSeconds}s)`);
    } catch (error) {
      log.warn(`Cache write failed for ${key}`, getErrorMessage(error));
    }
    return { payload, isStale: false, fetchedAt: entry.fetchedAt };
  }

  /**
   * Remove entries older than the retention window (independent of TTL).
   * Keys with a fetch in flight are left alone. Returns the number removed.
   */
  async purge(maxRetentionSeconds: number = this.maxRetentionSeconds): Promise<number> {
    const nowSeconds = this.nowSeconds();
    let removed = 0;

    for (const entry of await this.store.entries()) {
      if (nowSeconds - entry.fetchedAt <= maxRetentionSeconds) continue;
      if (this.inflight.isPending(entry.key)) continue;
      if (await this.store.delete(entry.key)) removed++;
    }

    if (removed > 0) {
      log.info(`Purge removed ${removed} entries older than ${maxRetentionSeconds}s`);
    }
    return removed;
  }

  async invalidate(key: string): Promise<boolean> {
    return this.store.delete(key);
  }

  async getStats() {
    const nowSeconds = this.nowSeconds();
    const entries = await this.store.entries();
    const fresh = entries.filter(entry => isFresh(entry, nowSeconds)).length;

    return {
      totalEntries: entries.length,
      freshEntries: fresh,
      staleEntries: entries.length - fresh,
      inflight: this.inflight.getStats().pendingRequests,
    };
  }
}

// Cache key generators
export const getCacheKey = {
  playerStats: (playerId: string | number, statType: string, window: number) =>
    `player_stats_${String(playerId).toLowerCase().trim()}_${statType.toUpperCase()}_${window}`,
};
