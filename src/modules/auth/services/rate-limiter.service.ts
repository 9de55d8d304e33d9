import {
  CACHE_KEYS,
  RateLimitOperation,
} from '@/common/constants/auth.constants';
import { ERRORS } from '@/common/exceptions/errors-factory';
import { KEY_VALUE_STORE, KeyValueStore } from '@/cache/key-value-store';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

interface RateLimitRule {
  maxAttempts: number;
  windowSeconds: number;
}

/**
 * Fixed-window counter per operation and identity. The window starts at the
 * first attempt and is not extended by later ones, so a burst straddling the
 * boundary can get up to twice the limit through.
 */
@Injectable()
export class RateLimiterService {
  private readonly logger = new Logger(RateLimiterService.name);
  private readonly rules: Record<RateLimitOperation, RateLimitRule>;

  constructor(
    @Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore,
    private readonly config: ConfigService,
  ) {
    this.rules = {
      [RateLimitOperation.SEND_CODE]: {
        maxAttempts: this.config.get<number>(
          'auth.rateLimit.sendCode.maxAttempts',
          3,
        ),
        windowSeconds: this.config.get<number>(
          'auth.rateLimit.sendCode.windowSeconds',
          300,
        ),
      },
      [RateLimitOperation.LOGIN]: {
        maxAttempts: this.config.get<number>(
          'auth.rateLimit.login.maxAttempts',
          5,
        ),
        windowSeconds: this.config.get<number>(
          'auth.rateLimit.login.windowSeconds',
          900,
        ),
      },
    };
  }

  /** Counts the attempt, then rejects with rate_limit_exceeded past the limit. */
  async checkLimit(
    operation: RateLimitOperation,
    identity: string,
  ): Promise<void> {
    const { maxAttempts, windowSeconds } = this.rules[operation];
    const count = await this.store.increment(
      CACHE_KEYS.RATE_LIMIT(operation, identity),
      windowSeconds,
    );

    if (count > maxAttempts) {
      this.logger.warn(`Rate limit hit: ${operation} for ${identity}`);
      throw ERRORS.RateLimitExceeded(operation);
    }
  }
}
