import type { Logger } from "../util/logger.js";
import { Inflight } from "./inflight.js";
import { TTLCache, type TTLCacheOptions } from "./ttl_cache.js";

export interface CachedLoaderOptions extends TTLCacheOptions {
  name: string;
  logger: Logger;
  // Share one upstream call between concurrent misses for the same key
  coalesce?: boolean;
}

export class CachedLoader<T> {
  readonly name: string;
  private readonly cache: TTLCache<T>;
  private readonly inflight?: Inflight<T>;
  private readonly logger: Logger;

  constructor(opts: CachedLoaderOptions) {
    this.name = opts.name;
    this.logger = opts.logger;
    this.cache = new TTLCache<T>({ ttlMs: opts.ttlMs, now: opts.now });
    if (opts.coalesce ?? true) {
      this.inflight = new Inflight<T>();
    }
  }

  async load(key: string, fetcher: () => Promise<T>): Promise<T> {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.logger.debug(`Cache hit (${this.name}): ${key}`);
      return cached;
    }
    this.logger.debug(`Cache miss (${this.name}): ${key}`);

    const fetchAndStore = async () => {
      const value = await fetcher();
      this.cache.set(key, value);
      return value;
    };
    return this.inflight ? this.inflight.run(key, fetchAndStore) : fetchAndStore();
  }

  prune(): number {
    return this.cache.prune();
  }

  get size(): number {
    return this.cache.size;
  }
}
