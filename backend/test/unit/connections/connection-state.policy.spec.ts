import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  assertCanReinvite,
  assertIsConnectionTarget,
  canTransition,
  decideDisconnect,
} from '../../../src/modules/connections/policies/connection-state.policy';
import type {
  ConnectionStatus,
  TenantConnection,
} from '../../../src/modules/connections/connection.types';

function connection(status: ConnectionStatus, retryCount = 0): TenantConnection {
  const at = new Date('2026-01-01T00:00:00Z');
  return {
    id: 'c1',
    requesterTenantId: 'brand',
    targetTenantId: 'supplier',
    invitationEmail: null,
    status,
    invitationTokenHash: 'hash',
    requestNote: null,
    retryCount,
    lastInvitedAt: at,
    createdAt: at,
    updatedAt: at,
  };
}

describe('canTransition', () => {
  it('follows the connection lifecycle', () => {
    expect(canTransition('PENDING', 'ACTIVE')).toBe(true);
    expect(canTransition('PENDING', 'REJECTED')).toBe(true);
    expect(canTransition('REJECTED', 'PENDING')).toBe(true);
    expect(canTransition('ACTIVE', 'DISCONNECTED')).toBe(true);
    expect(canTransition('SUSPENDED', 'DISCONNECTED')).toBe(true);
  });

  it('has no operation that suspends or resumes a connection', () => {
    expect(canTransition('ACTIVE', 'SUSPENDED')).toBe(false);
    expect(canTransition('SUSPENDED', 'ACTIVE')).toBe(false);
  });

  it('refuses shortcuts and anything out of DISCONNECTED', () => {
    expect(canTransition('REJECTED', 'ACTIVE')).toBe(false);
    expect(canTransition('ACTIVE', 'PENDING')).toBe(false);
    expect(canTransition('DISCONNECTED', 'PENDING')).toBe(false);
  });
});

describe('assertCanReinvite', () => {
  it('allows PENDING and REJECTED below the limit', () => {
    expect(() => assertCanReinvite(connection('PENDING', 2), 3)).not.toThrow();
    expect(() => assertCanReinvite(connection('REJECTED', 0), 3)).not.toThrow();
  });

  it('refuses at the limit with LIMIT_EXCEEDED', () => {
    try {
      assertCanReinvite(connection('PENDING', 3), 3);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.code).toBe('LIMIT_EXCEEDED');
      expect(e.message).toBe('Invitation retry limit (3) reached.');
    }
  });

  it('refuses live connections', () => {
    expect(() => assertCanReinvite(connection('ACTIVE'), 3)).toThrowError(
      'Cannot resend an invitation for a ACTIVE connection.',
    );
  });
});

describe('assertIsConnectionTarget', () => {
  it('hides the connection from anyone but the target', () => {
    expect(() => assertIsConnectionTarget(connection('PENDING'), 'supplier')).not.toThrow();
    expect(() => assertIsConnectionTarget(connection('PENDING'), 'someone')).toThrowError(
      'Connection not found.',
    );
  });
});

describe('decideDisconnect', () => {
  it('deletes unanswered and dead connections', () => {
    expect(decideDisconnect(undefined)).toBe('DELETE');
    expect(decideDisconnect(connection('PENDING'))).toBe('DELETE');
    expect(decideDisconnect(connection('REJECTED'))).toBe('DELETE');
    expect(decideDisconnect(connection('DISCONNECTED'))).toBe('DELETE');
  });

  it('keeps live connections as history', () => {
    expect(decideDisconnect(connection('ACTIVE'))).toBe('DISCONNECT');
    expect(decideDisconnect(connection('SUSPENDED'))).toBe('DISCONNECT');
  });
});
