/**
 * src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Resolves the `sid` cookie into req.authContext on every request.
 * - Endpoints decide whether auth is required (requireSession); this hook never throws
 *   for a missing session.
 *
 * RULES:
 * - Registered AFTER requestContext and authContext.
 * - A cookie whose session is gone (expired, logged out, corrupted) is cleared on the
 *   response so the browser stops sending it.
 */

import type { FastifyInstance } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';
import { clearSessionCookie } from './set-session-cookie';

/** Value of one cookie from a raw Cookie header, URI-decoded. */
export function readCookie(header: string | undefined, name: string): string | null {
  if (!header) return null;

  for (const pair of header.split(';')) {
    const [rawKey, ...rest] = pair.split('=');
    if (rawKey?.trim() !== name) continue;

    const value = rest.join('=').trim();
    if (!value) return null;
    try {
      return decodeURIComponent(value);
    } catch {
      return null;
    }
  }
  return null;
}

export function registerSessionMiddleware(
  app: FastifyInstance,
  opts: { sessionStore: SessionStore; isProduction: boolean },
): void {
  app.addHook('onRequest', async (req, reply) => {
    const sessionId = readCookie(req.headers.cookie, SESSION_COOKIE_NAME);
    if (!sessionId) return;

    const session = await opts.sessionStore.get(sessionId);
    if (!session) {
      clearSessionCookie(reply, opts.isProduction);
      return;
    }

    req.authContext = {
      userId: session.userId,
      tenantId: session.tenantId,
      membershipId: session.membershipId,
      role: session.role,
      sessionId,
    };
  });
}
