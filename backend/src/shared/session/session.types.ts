/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in Redis (via Cache) with a TTL.
 * - Each session carries exactly one ACTIVE membership: that membership's tenant is
 *   the acting tenant for every request made with the cookie. Switching tenants
 *   rewrites these fields in place (see SessionStore.updateSession).
 *
 * RULES:
 * - Session data must be JSON-serializable (stored in Redis as JSON string).
 * - Session cookie is HttpOnly, Secure (prod), SameSite=Strict.
 * - Never store passwords or tokens in session data.
 */

import { z } from 'zod';

export const sessionDataSchema = z.object({
  userId: z.string(),
  tenantId: z.string(),
  membershipId: z.string(),
  role: z.enum(['ADMIN', 'MEMBER']),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof sessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in Redis. Full key: `session:{sessionId}`.
 */
export const SESSION_KEY_PREFIX = 'session';
