/**
 * src/shared/cache/inmem-cache.ts
 *
 * WHY:
 * - Lets tests (and local dev without Redis) run the session + rate-limit stack
 *   without external infra.
 *
 * HOW TO USE:
 * - const cache = new InMemCache()
 */

import type { Cache, CacheSetOptions, CacheTtlOptions } from './cache';

type Expiring = { value: string; expiresAtMs: number | null };

export class InMemCache implements Cache {
  private readonly entries = new Map<string, Expiring>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  private expiryFor(ttlSeconds: number | undefined): number | null {
    return ttlSeconds ? this.now() + ttlSeconds * 1000 : null;
  }

  private live(key: string): Expiring | null {
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAtMs !== null && entry.expiresAtMs <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    return entry;
  }

  get(key: string): Promise<string | null> {
    return Promise.resolve(this.live(key)?.value ?? null);
  }

  set(key: string, value: string, opts?: CacheSetOptions): Promise<void> {
    const existing = this.live(key);
    const expiresAtMs = opts?.keepTtl
      ? (existing?.expiresAtMs ?? null)
      : this.expiryFor(opts?.ttlSeconds);

    this.entries.set(key, { value, expiresAtMs });
    return Promise.resolve();
  }

  del(key: string): Promise<void> {
    this.entries.delete(key);
    return Promise.resolve();
  }

  incr(key: string, opts?: CacheTtlOptions): Promise<number> {
    const existing = this.live(key);
    const next = existing ? Number(existing.value) + 1 : 1;

    // Redis-like: the window starts on the first hit and is not extended afterwards.
    const expiresAtMs = existing ? existing.expiresAtMs : this.expiryFor(opts?.ttlSeconds);
    this.entries.set(key, { value: String(next), expiresAtMs });

    return Promise.resolve(next);
  }

}
