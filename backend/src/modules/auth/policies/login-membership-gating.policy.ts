/**
 * backend/src/modules/auth/policies/login-membership-gating.policy.ts
 *
 * WHY:
 * - Which membership a login opens, and whether it may, is a security rule.
 * - Keep it pure + unit-testable (no DB, no HTTP).
 *
 * RULES:
 * - A requested tenant must have a membership of this user, else no access.
 * - Without a request, the first ACTIVE membership (oldest first) wins.
 * - SUSPENDED → suspended. INVITED → invite not yet accepted.
 *
 * IMPORTANT:
 * - The login flow logs a reason code for every failure, so this returns the
 *   reason alongside the error instead of only throwing.
 */

import { AuthErrors } from '../auth.errors';
import type { Membership } from '../../memberships/membership.types';
import { pickDefaultMembership } from '../../memberships/policies/membership-access.policy';

export type LoginMembershipGatingFailure =
  | { reason: 'no_membership'; error: Error }
  | { reason: 'suspended'; error: Error }
  | { reason: 'invite_not_accepted'; error: Error };

export function selectLoginMembership(
  memberships: readonly Membership[],
  requestedTenantId: string | undefined,
): Membership | undefined {
  if (requestedTenantId) {
    return memberships.find((m) => m.tenantId === requestedTenantId);
  }
  // Fall back to the oldest membership so its status explains why login failed.
  return pickDefaultMembership(memberships) ?? memberships[0];
}

/**
 * Returns null when OK; otherwise returns failure payload (reason + error).
 */
export function getLoginMembershipGatingFailure(
  membership: Membership | undefined,
): LoginMembershipGatingFailure | null {
  if (!membership) {
    return { reason: 'no_membership', error: AuthErrors.noAccess() };
  }
  if (membership.status === 'SUSPENDED') {
    return { reason: 'suspended', error: AuthErrors.accountSuspended() };
  }
  if (membership.status === 'INVITED') {
    return { reason: 'invite_not_accepted', error: AuthErrors.inviteNotYetAccepted() };
  }
  return null;
}

export function assertLoginMembershipAllowed(
  membership: Membership | undefined,
): asserts membership is Membership {
  const failure = getLoginMembershipGatingFailure(membership);
  if (failure) throw failure.error;
}
