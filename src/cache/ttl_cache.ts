export const CACHE_TTL_MS = 5 * 60 * 1000;

type CacheEntry<V> = { value: V; expiresAt: number };

export interface TTLCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/**
 * Process-local key/value store whose entries expire a fixed time after they
 * were written. Expiry is checked lazily on read; `prune()` sweeps eagerly.
 */
export class TTLCache<V> {
  private map = new Map<string, CacheEntry<V>>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: TTLCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? CACHE_TTL_MS;
    this.now = opts.now ?? Date.now;
  }

  get(key: string): V | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;
    // valid only while now < expiresAt
    if (this.now() >= entry.expiresAt) {
      this.map.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V) {
    this.map.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /** Drops every expired entry and returns how many were removed. */
  prune(): number {
    const now = this.now();
    let removed = 0;
    for (const [key, entry] of this.map) {
      if (now >= entry.expiresAt) {
        this.map.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.map.size;
  }
}
