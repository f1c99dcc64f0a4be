import { Logger } from '@nestjs/common';
import { CacheStore } from './cache-store';

interface CacheItem {
  payload: string;
  expiresAt: number;
}

/**
 * Process-local stand-in for Redis, selected with `CACHE_BACKEND=memory`.
 * Entries are stored serialised so callers get copies, as they would from
 * Redis.
 */
export class InMemoryCacheService extends CacheStore {
  protected readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheItem>();

  constructor(
    private readonly maxSize = 1000,
    private readonly now: () => number = Date.now,
  ) {
    super();
  }

  async get<T>(key: string): Promise<T | null> {
    const item = this.cache.get(key);

    if (!item) {
      this.logger.debug(`Cache MISS for key: ${key}`);
      return null;
    }

    if (this.now() >= item.expiresAt) {
      this.cache.delete(key);
      this.logger.debug(`Cache EXPIRED for key: ${key}`);
      return null;
    }

    this.logger.debug(`Cache HIT for key: ${key}`);
    const value: T = JSON.parse(item.payload);
    return value;
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    this.cache.delete(key);
    if (this.cache.size >= this.maxSize) {
      this.evictOldest();
    }

    this.cache.set(key, {
      payload: JSON.stringify(value),
      expiresAt: ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : Number.POSITIVE_INFINITY,
    });
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }

  get size(): number {
    return this.cache.size;
  }

  // Map iteration order is insertion order, and set() re-inserts on write.
  private evictOldest(): void {
    const oldest = this.cache.keys().next();
    if (!oldest.done) {
      this.cache.delete(oldest.value);
      this.logger.debug(`Evicted ${oldest.value}`);
    }
  }
}
