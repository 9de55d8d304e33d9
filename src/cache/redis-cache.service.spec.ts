import { AppError } from '@/common/exceptions/app-error';
import { ErrorCode } from '@/common/exceptions/error-codes';
import { createConfigService, testConfig } from '@/testing/test-config';
import { RedisCacheService } from './redis-cache.service';

const mockTransaction = {
  incr: jest.fn(),
  expire: jest.fn(),
  exec: jest.fn(),
};

const mockClient = {
  on: jest.fn(),
  get: jest.fn(),
  set: jest.fn(),
  del: jest.fn(),
  multi: jest.fn(() => mockTransaction),
  quit: jest.fn(),
  disconnect: jest.fn(),
};

jest.mock('ioredis', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation(() => mockClient),
}));

describe('RedisCacheService', () => {
  const enabled = () =>
    createConfigService({
      cache: {
        ...testConfig().cache,
        redis: {
          enabled: true,
          url: 'redis://localhost:6379',
          commandTimeout: 5000,
        },
      },
    });

  let service: RedisCacheService;

  beforeEach(async () => {
    jest.clearAllMocks();
    mockTransaction.incr.mockReturnValue(mockTransaction);
    mockTransaction.expire.mockReturnValue(mockTransaction);
    service = new RedisCacheService(enabled());
    await service.onModuleInit();
  });

  it('sets values with an expiry in seconds', async () => {
    mockClient.set.mockResolvedValue('OK');

    await service.set('signup:a@example.com', 'payload', 900);

    expect(mockClient.set).toHaveBeenCalledWith(
      'signup:a@example.com',
      'payload',
      'EX',
      900,
    );
  });

  it('increments and sets the TTL in one transaction', async () => {
    mockTransaction.exec.mockResolvedValueOnce([
      [null, 1],
      [null, 1],
    ]);

    await expect(service.increment('rate_limit:login:a', 900)).resolves.toBe(1);

    expect(mockClient.multi).toHaveBeenCalledTimes(1);
    expect(mockTransaction.incr).toHaveBeenCalledWith('rate_limit:login:a');
    expect(mockTransaction.expire).toHaveBeenCalledWith(
      'rate_limit:login:a',
      900,
      'NX',
    );
  });

  it('returns the count from the INCR reply', async () => {
    mockTransaction.exec.mockResolvedValueOnce([
      [null, 4],
      [null, 0],
    ]);

    await expect(service.increment('rate_limit:login:a', 900)).resolves.toBe(4);
    expect(mockClient.multi).toHaveBeenCalledTimes(1);
  });

  it('fails the increment when EXPIRE fails inside the transaction', async () => {
    const cause = new Error('ERR syntax error');
    mockTransaction.exec.mockResolvedValueOnce([
      [null, 1],
      [cause, null],
    ]);

    await expect(
      service.increment('rate_limit:login:a', 900),
    ).rejects.toMatchObject({
      code: ErrorCode.InternalError,
      originalError: cause,
    });
  });

  it('fails the increment when the transaction is aborted', async () => {
    mockTransaction.exec.mockResolvedValueOnce(null);

    await expect(
      service.increment('rate_limit:login:a', 900),
    ).rejects.toMatchObject({ code: ErrorCode.InternalError });
  });

  it('wraps command failures in internal_server_error', async () => {
    const cause = new Error('Command timed out');
    mockClient.get.mockRejectedValue(cause);

    const error = await service.get('k').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AppError);
    expect(error).toMatchObject({
      code: ErrorCode.InternalError,
      originalError: cause,
    });
  });

  it('rejects when Redis was never configured', async () => {
    const disabled = new RedisCacheService(createConfigService());
    await disabled.onModuleInit();

    await expect(disabled.get('k')).rejects.toMatchObject({
      code: ErrorCode.InternalError,
    });
  });

  it('quits the client on shutdown', async () => {
    mockClient.quit.mockResolvedValue('OK');

    await service.onModuleDestroy();

    expect(mockClient.quit).toHaveBeenCalled();
  });
});
