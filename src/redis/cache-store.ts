import { Logger } from '@nestjs/common';

/**
 * Key-value store for memoised results. Values are JSON-serialisable;
 * a `null` read is a miss.
 */
export abstract class CacheStore {
  protected abstract readonly logger: Logger;

  abstract get<T>(key: string): Promise<T | null>;

  abstract set<T>(key: string, value: T, ttlSeconds: number): Promise<void>;

  abstract del(key: string): Promise<void>;

  /**
   * Returns the cached value for `key`, or runs `fetch`, stores its result
   * for `ttlSeconds` and returns it. Errors from `fetch` are not cached.
   */
  async getOrSet<T>(key: string, fetch: () => Promise<T>, ttlSeconds: number): Promise<T> {
    const cached = await this.get<T>(key);
    if (cached !== null) {
      return cached;
    }

    this.logger.debug(`Cache MISS - computing ${key}`);
    const value = await fetch();
    await this.set(key, value, ttlSeconds);
    return value;
  }
}
