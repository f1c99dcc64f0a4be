import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Redis from 'ioredis';
import { CacheStore } from './cache-store';

/**
 * Redis-backed result cache shared by every worker.
 *
 * Reads and writes never fail the caller: an unreachable server turns reads
 * into misses and writes into no-ops, both logged.
 */
export class RedisService extends CacheStore implements OnModuleInit, OnModuleDestroy {
  protected readonly logger = new Logger(RedisService.name);
  private readonly client: Redis;

  constructor(url: string) {
    super();
    this.client = new Redis(url, {
      // a command fails after one retry while disconnected
      maxRetriesPerRequest: 1,
      enableReadyCheck: true,
      lazyConnect: false,
      retryStrategy(times) {
        return Math.min(times * 50, 2000);
      },
    });

    this.client.on('ready', () => {
      this.logger.log('Redis connected and ready');
    });

    this.client.on('error', (err) => {
      this.logger.warn(`Redis error: ${err.message}`);
    });
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.client.ping();
      this.logger.log('Redis connection verified');
    } catch (error) {
      this.logger.warn(
        `Redis connection check failed, will retry on first use: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  onModuleDestroy(): void {
    this.client.disconnect();
  }

  async get<T>(key: string): Promise<T | null> {
    try {
      const raw = await this.client.get(key);
      if (raw === null) {
        this.logger.debug(`Cache MISS for key: ${key}`);
        return null;
      }
      this.logger.debug(`Cache HIT for key: ${key}`);
      const parsed: T = JSON.parse(raw);
      return parsed;
    } catch (error) {
      this.logger.warn(`Redis get failed for key ${key}: ${error instanceof Error ? error.message : String(error)}`);
      return null;
    }
  }

  async set<T>(key: string, value: T, ttlSeconds: number): Promise<void> {
    try {
      const payload = JSON.stringify(value);
      if (ttlSeconds > 0) {
        await this.client.set(key, payload, 'EX', ttlSeconds);
      } else {
        await this.client.set(key, payload);
      }
    } catch (error) {
      this.logger.warn(`Redis set failed for key ${key}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  async del(key: string): Promise<void> {
    try {
      await this.client.del(key);
    } catch (error) {
      this.logger.warn(`Redis del failed for key ${key}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }
}
