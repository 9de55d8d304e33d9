import { createConfigService } from '@/testing/test-config';
import { InMemoryCacheService } from './in-memory-cache.service';

describe('InMemoryCacheService', () => {
  let store: InMemoryCacheService;

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    store = new InMemoryCacheService(createConfigService());
  });

  afterEach(() => {
    store.onModuleDestroy();
    jest.useRealTimers();
  });

  it('returns null for unknown keys', async () => {
    await expect(store.get('missing')).resolves.toBeNull();
  });

  it('stores and deletes values', async () => {
    await store.set('signup:a@example.com', '{"code":"123456"}', 60);
    await expect(store.get('signup:a@example.com')).resolves.toBe(
      '{"code":"123456"}',
    );

    await store.del('signup:a@example.com');
    await expect(store.get('signup:a@example.com')).resolves.toBeNull();
  });

  it('expires values after their TTL', async () => {
    await store.set('k', 'v', 10);

    jest.advanceTimersByTime(9_999);
    await expect(store.get('k')).resolves.toBe('v');

    jest.advanceTimersByTime(1);
    await expect(store.get('k')).resolves.toBeNull();
  });

  it('overwrites and resets TTL on set', async () => {
    await store.set('k', 'first', 10);
    jest.advanceTimersByTime(8_000);
    await store.set('k', 'second', 10);
    jest.advanceTimersByTime(8_000);

    await expect(store.get('k')).resolves.toBe('second');
  });

  describe('increment', () => {
    it('counts from one', async () => {
      await expect(store.increment('rate_limit:login:a', 60)).resolves.toBe(1);
      await expect(store.increment('rate_limit:login:a', 60)).resolves.toBe(2);
      await expect(store.increment('rate_limit:login:a', 60)).resolves.toBe(3);
    });

    it('anchors the window at the first increment', async () => {
      await store.increment('c', 60);
      jest.advanceTimersByTime(50_000);
      await store.increment('c', 60);

      jest.advanceTimersByTime(10_000);
      await expect(store.get('c')).resolves.toBeNull();
      await expect(store.increment('c', 60)).resolves.toBe(1);
    });
  });

  it('sweeps expired entries on the cleanup interval', async () => {
    store.onModuleInit();
    await store.set('a', '1', 1);
    await store.set('b', '2', 3600);

    jest.advanceTimersByTime(60_000);

    expect(store.size()).toBe(1);
  });
});
