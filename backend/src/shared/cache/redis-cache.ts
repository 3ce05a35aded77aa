/**
 * backend/src/shared/cache/redis-cache.ts
 *
 * WHY:
 * - Redis implementation of Cache used for sessions and rate limiting.
 *
 * IMPORTANT:
 * - Importing RedisClientType can cause type conflicts if multiple copies of
 *   @redis/client exist. We derive the client type from createClient() instead.
 *
 * LOGGING:
 * - Connection errors fire outside any request context, so the global logger is used.
 */

import { createClient } from 'redis';
import type { Cache, CacheSetOptions, CacheTtlOptions } from './cache';
import { logger } from '../logger/logger';

type RedisClient = ReturnType<typeof createClient>;

export class RedisCache implements Cache {
  private constructor(private readonly client: RedisClient) {}

  static async connect(redisUrl: string): Promise<RedisCache> {
    const client = createClient({ url: redisUrl });

    client.on('error', (err: Error) => {
      logger.error('redis.client_error', {
        flow: 'redis',
        message: err.message,
        stack: err.stack,
      });
    });

    await client.connect();
    return new RedisCache(client);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    if (opts?.keepTtl) {
      await this.client.set(key, value, { KEEPTTL: true });
      return;
    }
    if (opts?.ttlSeconds) {
      await this.client.set(key, value, { EX: opts.ttlSeconds });
      return;
    }
    await this.client.set(key, value);
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async incr(key: string, opts?: CacheTtlOptions): Promise<number> {
    const value = await this.client.incr(key);

    // First hit opens the window; later hits must not extend it.
    if (opts?.ttlSeconds && value === 1) {
      await this.client.expire(key, opts.ttlSeconds);
    }

    return value;
  }

}
