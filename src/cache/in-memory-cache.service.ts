import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { KeyValueStore } from './key-value-store';

interface CacheEntry {
  value: string;
  expiresAt: number;
}

/**
 * Process-local store. Good for development and tests; state is lost on
 * restart and is not shared between instances.
 */
@Injectable()
export class InMemoryCacheService
  implements KeyValueStore, OnModuleInit, OnModuleDestroy
{
  private readonly logger = new Logger(InMemoryCacheService.name);
  private readonly cache = new Map<string, CacheEntry>();
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(private readonly config: ConfigService) {}

  onModuleInit(): void {
    const cleanupIntervalMs = this.config.get<number>(
      'cache.cleanupInterval',
      60_000,
    );

    this.cleanupInterval = setInterval(() => {
      this.cleanup();
    }, cleanupIntervalMs);
    this.cleanupInterval.unref();

    this.logger.log(
      `In-memory store initialized (cleanup: ${cleanupIntervalMs}ms)`,
    );
  }

  onModuleDestroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.cache.clear();
  }

  async get(key: string): Promise<string | null> {
    return this.read(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.cache.set(key, {
      value,
      expiresAt: Date.now() + ttlSeconds * 1000,
    });
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const entry = this.read(key);

    if (!entry) {
      await this.set(key, '1', ttlSeconds);
      return 1;
    }

    const next = (parseInt(entry.value, 10) || 0) + 1;
    // Same expiry as before: the window is fixed at creation.
    entry.value = String(next);
    return next;
  }

  size(): number {
    return this.cache.size;
  }

  private read(key: string): CacheEntry | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      return null;
    }

    return entry;
  }

  private cleanup(): void {
    const now = Date.now();
    let cleanedCount = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        cleanedCount++;
      }
    }

    if (cleanedCount > 0) {
      this.logger.debug(
        `Cleaned up ${cleanedCount} expired entries (${this.cache.size} remaining)`,
      );
    }
  }
}
