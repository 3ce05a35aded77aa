/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Authentication and access are separate concepts.
 * - Populated from the server-side session; all fields are null for anonymous requests.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets an empty context (all null) on every request.
 * 2. Session middleware overwrites it with real values if a valid cookie exists.
 * 3. Controllers read it through requireSession() and hand an explicit
 *    ActingContext to services.
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { MembershipRole } from '../../modules/memberships/membership.types';

export type AuthContext = {
  userId: string | null;
  tenantId: string | null;
  membershipId: string | null;
  role: MembershipRole | null;
  sessionId: string | null;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export function emptyAuthContext(): AuthContext {
  return {
    userId: null,
    tenantId: null,
    membershipId: null,
    role: null,
    sessionId: null,
  };
}

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = emptyAuthContext();
    done();
  });
}
