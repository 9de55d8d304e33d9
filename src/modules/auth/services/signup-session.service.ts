import { KEY_VALUE_STORE, KeyValueStore } from '@/cache/key-value-store';
import { CACHE_KEYS } from '@/common/constants/auth.constants';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  isPendingSignup,
  PendingSignup,
  unixNow,
} from '../types/session.type';

/**
 * At most one pending signup per email. Saving again replaces the previous
 * entry, its code and its TTL.
 */
@Injectable()
export class SignupSessionService {
  private readonly logger = new Logger(SignupSessionService.name);

  constructor(
    @Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore,
    private readonly config: ConfigService,
  ) {}

  get ttl(): number {
    return this.config.get<number>('auth.signupSessionTtl', 900);
  }

  async save(email: string, passwordHash: string, code: string): Promise<void> {
    const session: PendingSignup = {
      password_hash: passwordHash,
      code,
      created_at: unixNow(),
    };
    await this.store.set(
      CACHE_KEYS.SIGNUP_SESSION(email),
      JSON.stringify(session),
      this.ttl,
    );
  }

  async get(email: string): Promise<PendingSignup | null> {
    const raw = await this.store.get(CACHE_KEYS.SIGNUP_SESSION(email));
    if (raw === null) return null;

    const parsed: unknown = JSON.parse(raw);
    if (!isPendingSignup(parsed)) {
      this.logger.warn(`Discarding malformed signup session for ${email}`);
      return null;
    }
    return parsed;
  }

  async delete(email: string): Promise<void> {
    await this.store.del(CACHE_KEYS.SIGNUP_SESSION(email));
  }
}
