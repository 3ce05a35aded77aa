/**
 * src/modules/memberships/membership.errors.ts
 *
 * WHY:
 * - Errors raised when a session is moved onto a membership.
 *
 * SECURITY:
 * - "No access" never reveals whether the user belongs to the other organization.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MembershipErrors = {
  membershipNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('You do not have access to this organization.', meta);
  },

  membershipSuspended(meta?: AppErrorMeta) {
    return AppError.forbidden('Your membership in this organization is suspended.', meta);
  },

  membershipStillInvited(meta?: AppErrorMeta) {
    return AppError.conflict('Accept the invitation to this organization first.', meta);
  },
} as const;
