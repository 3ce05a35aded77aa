/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Sessions and rate-limit counters are short-lived state that must be externalized.
 * - We depend on an abstraction so tests can use an in-memory implementation.
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.set(key, value, { keepTtl: true })  // overwrite without refreshing TTL
 * - cache.incr(key, { ttlSeconds })            // counter with expiration
 */

export type CacheSetOptions = {
  ttlSeconds?: number;

  /**
   * Keep the existing TTL when overwriting a key (Redis SET ... KEEPTTL).
   * Used when a session payload changes (switch-tenant) but its lifetime must not.
   */
  keepTtl?: boolean;
};

export type CacheTtlOptions = {
  ttlSeconds?: number;
};

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /** Atomically increments a counter and returns the new value. */
  incr(key: string, opts?: CacheTtlOptions): Promise<number>;
}
