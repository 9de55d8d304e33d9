/** Pending signup stored at `signup:<email>` until the code is verified. */
export interface PendingSignup {
  password_hash: string;
  code: string;
  /** Unix seconds. Expiry is enforced by the store TTL, not this field. */
  created_at: number;
}

/** Stored at `refresh_token:<token>`. */
export interface RefreshTokenRecord {
  user_id: number;
  client_id: string;
  created_at: number;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

export const isPendingSignup = (value: unknown): value is PendingSignup =>
  isRecord(value) &&
  typeof value.password_hash === 'string' &&
  typeof value.code === 'string' &&
  typeof value.created_at === 'number';

export const isRefreshTokenRecord = (
  value: unknown,
): value is RefreshTokenRecord =>
  isRecord(value) &&
  typeof value.user_id === 'number' &&
  typeof value.client_id === 'string' &&
  typeof value.created_at === 'number';

export const unixNow = (): number => Math.floor(Date.now() / 1000);
