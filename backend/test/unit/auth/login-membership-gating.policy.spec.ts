import { describe, it, expect } from 'vitest';
import {
  assertLoginMembershipAllowed,
  getLoginMembershipGatingFailure,
  selectLoginMembership,
} from '../../../src/modules/auth/policies/login-membership-gating.policy';
import type {
  Membership,
  MembershipStatus,
} from '../../../src/modules/memberships/membership.types';

function membership(id: string, tenantId: string, status: MembershipStatus): Membership {
  const at = new Date('2026-01-01T00:00:00Z');
  return { id, tenantId, userId: 'u1', role: 'ADMIN', status, createdAt: at, updatedAt: at };
}

describe('getLoginMembershipGatingFailure', () => {
  it('assertLoginMembershipAllowed does not throw for ACTIVE', () => {
    expect(() => assertLoginMembershipAllowed(membership('m1', 't1', 'ACTIVE'))).not.toThrow();
  });

  it('returns failure for missing membership', () => {
    expect(getLoginMembershipGatingFailure(undefined)?.reason).toBe('no_membership');
  });

  it('returns failure for SUSPENDED membership', () => {
    expect(getLoginMembershipGatingFailure(membership('m1', 't1', 'SUSPENDED'))?.reason).toBe(
      'suspended',
    );
  });

  it('returns failure for INVITED membership', () => {
    expect(getLoginMembershipGatingFailure(membership('m1', 't1', 'INVITED'))?.reason).toBe(
      'invite_not_accepted',
    );
  });

  it('returns null for ACTIVE membership', () => {
    expect(getLoginMembershipGatingFailure(membership('m1', 't1', 'ACTIVE'))).toBeNull();
  });
});

describe('selectLoginMembership', () => {
  const memberships = [
    membership('m1', 't1', 'SUSPENDED'),
    membership('m2', 't2', 'ACTIVE'),
    membership('m3', 't3', 'ACTIVE'),
  ];

  it('picks the requested organization', () => {
    expect(selectLoginMembership(memberships, 't3')?.id).toBe('m3');
  });

  it('returns undefined when the requested organization is not a membership', () => {
    expect(selectLoginMembership(memberships, 't9')).toBeUndefined();
  });

  it('defaults to the first ACTIVE membership', () => {
    expect(selectLoginMembership(memberships, undefined)?.id).toBe('m2');
  });

  it('falls back to the oldest membership when none is ACTIVE', () => {
    const inactive = [membership('m1', 't1', 'SUSPENDED'), membership('m2', 't2', 'INVITED')];
    expect(selectLoginMembership(inactive, undefined)?.id).toBe('m1');
  });
});
