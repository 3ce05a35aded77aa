/**
 * src/shared/security/rate-limit.ts
 *
 * WHY:
 * - Login is the only unauthenticated endpoint that checks credentials; it must be
 *   throttled per account to blunt password guessing.
 * - Uses Redis in prod, but depends only on Cache (DIP).
 *
 * HOW TO USE:
 * - const limiter = new RateLimiter(cache, { prefix: 'rl' })
 * - await limiter.hitOrThrow({ key: 'login:email:a@b.c', limit: 5, windowSeconds: 900 })
 *
 * ATOMICITY:
 * - INCR-then-check, not check-then-INCR. INCR is atomic in Redis, so two concurrent
 *   requests cannot both slip under the limit.
 *
 * DISABLING:
 * - Pass `disabled: true` to skip all checks. That decision belongs to the
 *   composition root (di.ts), never to this class.
 */

import type { Cache } from '../cache/cache';

export class RateLimitError extends Error {
  constructor(
    public readonly key: string,
    public readonly limit: number,
    public readonly windowSeconds: number,
  ) {
    super('Rate limit exceeded');
    this.name = 'RateLimitError';
  }
}

export type RateLimitRule = {
  key: string;
  limit: number;
  windowSeconds: number;
};

export class RateLimiter {
  constructor(
    private readonly cache: Cache,
    private readonly opts?: { prefix?: string; disabled?: boolean },
  ) {}

  private buildKey(key: string): string {
    return this.opts?.prefix ? `${this.opts.prefix}:${key}` : key;
  }

  /**
   * Increments the counter for `key`.
   * Throws RateLimitError once the counter exceeds `limit` inside the window.
   */
  async hitOrThrow(rule: RateLimitRule): Promise<void> {
    if (this.opts?.disabled) return;

    const fullKey = this.buildKey(rule.key);
    const current = await this.cache.incr(fullKey, { ttlSeconds: rule.windowSeconds });

    if (current > rule.limit) {
      throw new RateLimitError(fullKey, rule.limit, rule.windowSeconds);
    }
  }
}
