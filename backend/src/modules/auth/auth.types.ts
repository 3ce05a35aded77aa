/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Response types for signup / login / me / switch-tenant.
 *
 * RULES:
 * - Never include raw passwords, hashes, or tokens in response types.
 */

import type { PublicUser } from '../users/user.types';
import type { MembershipRole } from '../memberships/membership.types';
import type { TenantType } from '../tenants/tenant.types';

export type TenantSummary = {
  id: string;
  name: string;
  slug: string;
  type: TenantType;
};

export type AuthResult = {
  status: 'AUTHENTICATED';
  user: PublicUser;
  tenant: TenantSummary;
  membership: {
    id: string;
    role: MembershipRole;
  };
};

/** One organization the user may switch to. */
export type MembershipOption = {
  membershipId: string;
  role: MembershipRole;
  tenant: TenantSummary;
};

export type MeResult = {
  user: PublicUser;
  activeTenant: TenantSummary;
  membership: {
    id: string;
    role: MembershipRole;
  };
  memberships: MembershipOption[];
};
