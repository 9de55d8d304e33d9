import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InMemoryCacheService } from './in-memory-cache.service';
import { KeyValueStore } from './key-value-store';
import { RedisCacheService } from './redis-cache.service';

export type CacheStrategy = 'redis' | 'memory';

/**
 * The store the rest of the application talks to. Picks Redis when
 * `cache.redis.enabled` is set, the in-process map otherwise. The choice is
 * made once at boot; a Redis outage is an error, not a switch to memory.
 */
@Injectable()
export class AppCacheService implements KeyValueStore {
  private readonly logger = new Logger(AppCacheService.name);
  private readonly strategy: CacheStrategy;
  private readonly store: KeyValueStore;

  constructor(
    private readonly config: ConfigService,
    redisCache: RedisCacheService,
    memoryCache: InMemoryCacheService,
  ) {
    this.strategy = this.config.get<boolean>('cache.redis.enabled')
      ? 'redis'
      : 'memory';
    this.store = this.strategy === 'redis' ? redisCache : memoryCache;

    this.logger.log(`Cache strategy: ${this.strategy}`);
  }

  get(key: string): Promise<string | null> {
    return this.store.get(key);
  }

  set(key: string, value: string, ttlSeconds: number): Promise<void> {
    return this.store.set(key, value, ttlSeconds);
  }

  del(key: string): Promise<void> {
    return this.store.del(key);
  }

  increment(key: string, ttlSeconds: number): Promise<number> {
    return this.store.increment(key, ttlSeconds);
  }

  getStrategy(): CacheStrategy {
    return this.strategy;
  }
}
