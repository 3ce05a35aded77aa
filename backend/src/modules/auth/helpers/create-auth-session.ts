/**
 * src/modules/auth/helpers/create-auth-session.ts
 *
 * WHY:
 * - Signup and login both end by opening a session on one ACTIVE membership.
 *
 * RULES:
 * - No DB access (sessions live in Redis via SessionStore).
 * - Cookie flags are set by the controller, not here.
 */

import type { SessionStore } from '../../../shared/session/session.store';
import type { Membership } from '../../memberships/membership.types';

export async function createAuthSession(params: {
  sessionStore: SessionStore;
  membership: Pick<Membership, 'id' | 'userId' | 'tenantId' | 'role'>;
  now: Date;
}): Promise<string> {
  const { sessionStore, membership, now } = params;

  return sessionStore.create({
    userId: membership.userId,
    tenantId: membership.tenantId,
    membershipId: membership.id,
    role: membership.role,
    createdAt: now.toISOString(),
  });
}
