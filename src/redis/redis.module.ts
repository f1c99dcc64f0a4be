import { Global, Logger, Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { EnvironmentVariables } from '../config/env.validation';
import { CacheStore } from './cache-store';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisService } from './redis.service';

@Global()
@Module({
  providers: [
    {
      provide: CacheStore,
      useFactory: (config: ConfigService<EnvironmentVariables, true>): CacheStore => {
        if (config.get('CACHE_BACKEND', { infer: true }) === 'memory') {
          new Logger(RedisModule.name).warn('Using in-memory cache; results are not shared between workers');
          return new InMemoryCacheService();
        }
        return new RedisService(config.get('REDIS_URL', { infer: true }));
      },
      inject: [ConfigService],
    },
  ],
  exports: [CacheStore],
})
export class RedisModule {}
