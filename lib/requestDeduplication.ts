// Request deduplication (singleflight)
// Concurrent callers for the same key share one in-flight promise; different keys never wait on each other

export class RequestDeduplicator {
  private pending = new Map<string, Promise<unknown>>();

  /**
   * Execute a request with deduplication
   * If an identical request is already in flight, return that promise instead
   *
   * @param key - Unique identifier for the request
   * @param fn - Function that starts the actual request
   */
  dedupe<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.pending.get(key);
    if (existing) {
      return existing as Promise<T>;
    }

    const promise = fn().finally(() => {
      this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  isPending(key: string): boolean {
    return this.pending.has(key);
  }

  getStats() {
    return {
      pendingRequests: this.pending.size,
      keys: Array.from(this.pending.keys()),
    };
  }
}
