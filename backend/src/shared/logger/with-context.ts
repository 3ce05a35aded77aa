/**
 * src/shared/logger/with-context.ts
 *
 * HOW TO USE:
 * - `withRequestContext(req).warn('app_error', { flow: 'http.error' })`
 * - Returns a winston child logger carrying requestId and the acting session
 *   (user, tenant, membership, role) as default meta.
 */

import type { FastifyRequest } from 'fastify';
import { logger, type Logger } from './logger';

export function withRequestContext(req: FastifyRequest): Logger {
  const auth = req.authContext;
  return logger.child({
    requestId: req.requestContext?.requestId,
    userId: auth?.userId ?? null,
    tenantId: auth?.tenantId ?? null,
    membershipId: auth?.membershipId ?? null,
    role: auth?.role ?? null,
  });
}
