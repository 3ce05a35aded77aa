/**
 * src/modules/memberships/policies/membership-access.policy.ts
 *
 * WHY:
 * - switch-tenant and login both need "which membership may carry a session".
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - A missing membership and one owned by another user look the same (NOT_FOUND).
 * - Only ACTIVE memberships may carry a session.
 */

import type { Membership } from '../membership.types';
import { MembershipErrors } from '../membership.errors';

/**
 * Narrows `membership` to one the user may switch into; throws otherwise.
 */
export function assertSwitchableMembership(
  membership: Membership | undefined,
  userId: string,
): asserts membership is Membership {
  if (!membership || membership.userId !== userId) {
    throw MembershipErrors.membershipNotFound({ userId });
  }

  switch (membership.status) {
    case 'ACTIVE':
      return;
    case 'SUSPENDED':
      throw MembershipErrors.membershipSuspended({ membershipId: membership.id });
    case 'INVITED':
      throw MembershipErrors.membershipStillInvited({ membershipId: membership.id });
  }
}

/** First ACTIVE membership in the given (oldest-first) order. */
export function pickDefaultMembership(memberships: readonly Membership[]): Membership | undefined {
  return memberships.find((m) => m.status === 'ACTIVE');
}
