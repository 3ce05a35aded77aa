/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side sessions kept in the Cache (Redis in prod), keyed `session:{id}`.
 * - Logout is a single DEL; expiry is the cache TTL, so an expired session is never read.
 *
 * RULES:
 * - Depends only on the Cache interface.
 * - No HTTP concerns here (cookie handling lives in set-session-cookie / middleware).
 * - A payload that fails the schema is deleted and reported as missing.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { SESSION_KEY_PREFIX, sessionDataSchema, type SessionData } from './session.types';

function decode(raw: string): SessionData | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const parsed = sessionDataSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly ttlSeconds: number,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  /** Stores a new session; the caller sets the cookie with the returned id. */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();
    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlSeconds,
    });
    return sessionId;
  }

  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (raw === null) return null;

    const data = decode(raw);
    if (!data) await this.cache.del(this.key(sessionId));
    return data;
  }

  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }

  /**
   * Moves an existing session to another membership (switch-tenant).
   * The remaining lifetime is kept. Returns false when the session is gone.
   */
  async updateSession(sessionId: string, partial: Partial<SessionData>): Promise<boolean> {
    const existing = await this.get(sessionId);
    if (!existing) return false;

    await this.cache.set(this.key(sessionId), JSON.stringify({ ...existing, ...partial }), {
      keepTtl: true,
    });
    return true;
  }
}
