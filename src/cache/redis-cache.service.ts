import { ERRORS } from '@/common/exceptions/errors-factory';
import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import Redis, { RedisOptions } from 'ioredis';
import { KeyValueStore } from './key-value-store';

@Injectable()
export class RedisCacheService
  implements KeyValueStore, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(RedisCacheService.name);
  private redis: Redis | null = null;
  private reconnectAttempts = 0;

  constructor(private readonly config: ConfigService) {}

  async onModuleInit(): Promise<void> {
    if (!this.config.get<boolean>('cache.redis.enabled')) return;

    const redisUrl = this.config.get<string>('cache.redis.url');
    if (!redisUrl) {
      this.logger.error('REDIS_ENABLED is set but REDIS_URL is missing.');
      return;
    }

    const options: RedisOptions = {
      retryStrategy: (times: number): number => {
        const delay = Math.min(times * 100, 3000);
        this.logger.warn(
          `Retrying Redis connection in ${delay}ms (attempt ${times})`,
        );
        return delay;
      },
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      keepAlive: 30000,
      connectTimeout: 10000,
      commandTimeout: this.config.get<number>(
        'cache.redis.commandTimeout',
        5000,
      ),
    };

    this.redis = new Redis(redisUrl, options);

    this.redis.on('ready', () => {
      this.reconnectAttempts = 0;
      this.logger.log('Redis ready');
    });

    this.redis.on('error', (error: Error) => {
      this.logger.error(`Redis connection error: ${error.message}`);
    });

    this.redis.on('reconnecting', (delay: number) => {
      this.reconnectAttempts++;
      this.logger.log(
        `Redis reconnecting in ${delay}ms (attempt ${this.reconnectAttempts})`,
      );
    });

    this.redis.on('end', () => {
      this.logger.warn('Redis connection ended');
    });
  }

  async onModuleDestroy(): Promise<void> {
    if (!this.redis) return;

    try {
      await this.redis.quit();
      this.logger.log('Redis connection gracefully closed');
    } catch (error) {
      this.logger.error(
        'Error closing Redis connection:',
        error instanceof Error ? error.message : String(error),
      );
      this.redis.disconnect();
    } finally {
      this.redis = null;
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run('GET', key, (redis) => redis.get(key));
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.run('SET', key, (redis) =>
      redis.set(key, value, 'EX', ttlSeconds),
    );
  }

  async del(key: string): Promise<void> {
    await this.run('DEL', key, (redis) => redis.del(key));
  }

  /**
   * INCR and EXPIRE NX run in one MULTI, so a counter never exists without a
   * TTL and later increments keep the window's original expiry. EXPIRE NX
   * needs Redis 7.
   */
  async increment(key: string, ttlSeconds: number): Promise<number> {
    return this.run('INCR', key, async (redis) => {
      const results = await redis
        .multi()
        .incr(key)
        .expire(key, ttlSeconds, 'NX')
        .exec();
      if (!results) {
        throw new Error('MULTI was aborted');
      }

      for (const [error] of results) {
        if (error) throw error;
      }

      const value = results[0]?.[1];
      if (typeof value !== 'number') {
        throw new Error(`Unexpected INCR reply: ${String(value)}`);
      }
      return value;
    });
  }

  private async run<T>(
    command: string,
    key: string,
    fn: (redis: Redis) => Promise<T>,
  ): Promise<T> {
    if (!this.redis) {
      throw ERRORS.InternalError(`Redis not available for ${command} ${key}`);
    }

    try {
      return await fn(this.redis);
    } catch (error) {
      throw ERRORS.InternalError(
        `Redis ${command} failed for "${key}"`,
        error instanceof Error ? error : undefined,
      );
    }
  }
}
