import { KEY_VALUE_STORE, KeyValueStore } from '@/cache/key-value-store';
import { CACHE_KEYS } from '@/common/constants/auth.constants';
import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  isRefreshTokenRecord,
  RefreshTokenRecord,
  unixNow,
} from '../types/session.type';

@Injectable()
export class RefreshTokenService {
  private readonly logger = new Logger(RefreshTokenService.name);

  constructor(
    @Inject(KEY_VALUE_STORE) private readonly store: KeyValueStore,
    private readonly config: ConfigService,
  ) {}

  async save(token: string, userId: number, clientId: string): Promise<void> {
    const record: RefreshTokenRecord = {
      user_id: userId,
      client_id: clientId,
      created_at: unixNow(),
    };
    await this.store.set(
      CACHE_KEYS.REFRESH_TOKEN(token),
      JSON.stringify(record),
      this.config.get<number>('jwt.refreshTokenTtl', 2_592_000),
    );
  }

  async get(token: string): Promise<RefreshTokenRecord | null> {
    const raw = await this.store.get(CACHE_KEYS.REFRESH_TOKEN(token));
    if (raw === null) return null;

    const parsed: unknown = JSON.parse(raw);
    if (!isRefreshTokenRecord(parsed)) {
      this.logger.warn('Discarding malformed refresh token record');
      return null;
    }
    return parsed;
  }

  async delete(token: string): Promise<void> {
    await this.store.del(CACHE_KEYS.REFRESH_TOKEN(token));
  }
}
