import { describe, it, expect } from 'vitest';
import {
  assertSwitchableMembership,
  pickDefaultMembership,
} from '../../../src/modules/memberships/policies/membership-access.policy';
import type {
  Membership,
  MembershipStatus,
} from '../../../src/modules/memberships/membership.types';
import type { AppError } from '../../../src/shared/http/errors';

function membership(id: string, status: MembershipStatus, userId = 'u1'): Membership {
  const at = new Date('2026-01-01T00:00:00Z');
  return { id, tenantId: `t-${id}`, userId, role: 'MEMBER', status, createdAt: at, updatedAt: at };
}

function caught(fn: () => void): AppError {
  try {
    fn();
  } catch (err) {
    return err as AppError;
  }
  throw new Error('expected to throw');
}

describe('assertSwitchableMembership', () => {
  it('accepts an ACTIVE membership of the same user', () => {
    expect(() => assertSwitchableMembership(membership('m1', 'ACTIVE'), 'u1')).not.toThrow();
  });

  it('reports a missing membership as not found', () => {
    const err = caught(() => assertSwitchableMembership(undefined, 'u1'));
    expect(err.status).toBe(404);
    expect(err.message).toBe('You do not have access to this organization.');
  });

  it('reports another user membership as not found', () => {
    const err = caught(() => assertSwitchableMembership(membership('m1', 'ACTIVE', 'u2'), 'u1'));
    expect(err.status).toBe(404);
  });

  it('rejects SUSPENDED with 403', () => {
    const err = caught(() => assertSwitchableMembership(membership('m1', 'SUSPENDED'), 'u1'));
    expect(err.status).toBe(403);
    expect(err.code).toBe('FORBIDDEN');
  });

  it('rejects INVITED with 409', () => {
    const err = caught(() => assertSwitchableMembership(membership('m1', 'INVITED'), 'u1'));
    expect(err.status).toBe(409);
    expect(err.message).toBe('Accept the invitation to this organization first.');
  });
});

describe('pickDefaultMembership', () => {
  it('returns the first ACTIVE membership', () => {
    const picked = pickDefaultMembership([
      membership('m1', 'INVITED'),
      membership('m2', 'ACTIVE'),
      membership('m3', 'ACTIVE'),
    ]);
    expect(picked?.id).toBe('m2');
  });

  it('returns undefined when none is ACTIVE', () => {
    expect(pickDefaultMembership([membership('m1', 'SUSPENDED')])).toBeUndefined();
  });
});
