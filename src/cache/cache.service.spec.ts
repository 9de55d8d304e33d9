import { createConfigService, testConfig } from '@/testing/test-config';
import { AppCacheService } from './cache.service';
import { InMemoryCacheService } from './in-memory-cache.service';
import { RedisCacheService } from './redis-cache.service';

describe('AppCacheService', () => {
  const build = (redisEnabled: boolean) => {
    const config = createConfigService({
      cache: {
        ...testConfig().cache,
        redis: { enabled: redisEnabled, url: null, commandTimeout: 5000 },
      },
    });
    const redis = new RedisCacheService(config);
    const memory = new InMemoryCacheService(config);
    const service = new AppCacheService(config, redis, memory);
    return { service, redis, memory };
  };

  it('uses the in-memory store when Redis is disabled', async () => {
    const { service, memory } = build(false);
    const spy = jest.spyOn(memory, 'increment');

    await service.increment('k', 60);

    expect(service.getStrategy()).toBe('memory');
    expect(spy).toHaveBeenCalledWith('k', 60);
  });

  it('uses Redis when enabled and does not fall back on failure', async () => {
    const { service, redis, memory } = build(true);
    const failure = new Error('down');
    jest.spyOn(redis, 'get').mockRejectedValue(failure);
    const memoryGet = jest.spyOn(memory, 'get');

    await expect(service.get('k')).rejects.toBe(failure);

    expect(service.getStrategy()).toBe('redis');
    expect(memoryGet).not.toHaveBeenCalled();
  });
});
