import { Global, Module } from '@nestjs/common';
import { AppCacheService } from './cache.service';
import { InMemoryCacheService } from './in-memory-cache.service';
import { KEY_VALUE_STORE } from './key-value-store';
import { RedisCacheService } from './redis-cache.service';

@Global()
@Module({
  providers: [
    InMemoryCacheService,
    RedisCacheService,
    AppCacheService,
    { provide: KEY_VALUE_STORE, useExisting: AppCacheService },
  ],
  exports: [KEY_VALUE_STORE],
})
export class AppCacheModule {}
