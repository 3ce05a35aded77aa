/**
 * backend/src/modules/memberships/membership.types.ts
 *
 * WHY:
 * - A Membership connects a User to a Tenant.
 * - Defines role (ADMIN/MEMBER) and status (INVITED/ACTIVE/SUSPENDED).
 * - Access is decided by membership, never by user alone.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

export type MembershipId = string;

export const MEMBERSHIP_ROLES = ['ADMIN', 'MEMBER'] as const;
export type MembershipRole = (typeof MEMBERSHIP_ROLES)[number];

export type MembershipStatus = 'INVITED' | 'ACTIVE' | 'SUSPENDED';

export type Membership = {
  id: MembershipId;
  tenantId: string;
  userId: string;

  role: MembershipRole;
  status: MembershipStatus;

  createdAt: Date;
  updatedAt: Date;
};

export type NewMembership = {
  tenantId: string;
  userId: string;
  role: MembershipRole;
  status: MembershipStatus;
};
