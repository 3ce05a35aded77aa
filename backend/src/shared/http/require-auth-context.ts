/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session/auth" logic.
 * - Services never read the session: they receive an explicit ActingContext
 *   (user + acting tenant + role + requestId) built here.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or transactions.
 * - Throws AppError so error-handler maps it consistently.
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { MembershipRole } from '../../modules/memberships/membership.types';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: string;
  tenantId: string;
  membershipId: string;
  role: MembershipRole;
}>;

/**
 * The identity every workflow operation runs as.
 * tenantId is the acting tenant (the session's active membership).
 */
export type ActingContext = Readonly<{
  userId: string;
  tenantId: string;
  membershipId: string;
  role: MembershipRole;
  requestId: string;
}>;

export type RequireSessionOptions = Readonly<{
  role?: MembershipRole;
}>;

/**
 * Controller guard: requires a session, and optionally enforces role.
 *
 * Guard sequence (LOCKED):
 * 1) no session -> 401 "Authentication required"
 * 2) wrong role -> 403 "Insufficient role."
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const ctx = req.authContext;
  if (!ctx) throw AppError.unauthorized('Authentication required');

  if (!ctx.sessionId || !ctx.userId || !ctx.tenantId || !ctx.membershipId || !ctx.role) {
    throw AppError.unauthorized('Authentication required');
  }

  if (opts.role && ctx.role !== opts.role) {
    throw AppError.forbidden('Insufficient role.');
  }

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    tenantId: ctx.tenantId,
    membershipId: ctx.membershipId,
    role: ctx.role,
  };
}

export function requireActingContext(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): ActingContext {
  const session = requireSession(req, opts);

  return {
    userId: session.userId,
    tenantId: session.tenantId,
    membershipId: session.membershipId,
    role: session.role,
    requestId: req.requestContext.requestId,
  };
}
