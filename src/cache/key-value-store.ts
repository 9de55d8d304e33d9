/**
 * Minimal string store backing signup sessions, refresh tokens and rate
 * counters. Every key carries a TTL; an expired key reads as absent.
 *
 * Implementations never swallow backend failures: a store that cannot be
 * reached rejects, and the request fails with internal_server_error.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  /**
   * Atomically adds one to the counter at `key` and returns the new value.
   * The TTL is applied only when the counter is created (new value 1);
   * later increments keep the remaining lifetime of the window.
   */
  increment(key: string, ttlSeconds: number): Promise<number>;
}

export const KEY_VALUE_STORE = Symbol('KEY_VALUE_STORE');
