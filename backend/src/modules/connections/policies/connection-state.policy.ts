/**
 * backend/src/modules/connections/policies/connection-state.policy.ts
 *
 * WHY:
 * - One transition table for TenantConnection. Every status change goes through
 *   assertConnectionTransition().
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 *   PENDING      -> ACTIVE | REJECTED | PENDING (reinvite)
 *   REJECTED     -> PENDING (reinvite)
 *   ACTIVE       -> DISCONNECTED
 *   SUSPENDED    -> DISCONNECTED
 *   DISCONNECTED -> (terminal)
 * - Reinvite is bounded by maxRetries (retryCount counts reinvites, not the first send).
 */

import type { ConnectionStatus, TenantConnection } from '../connection.types';
import { ConnectionErrors } from '../connection.errors';

const TRANSITIONS: Readonly<Record<ConnectionStatus, readonly ConnectionStatus[]>> = {
  PENDING: ['ACTIVE', 'REJECTED', 'PENDING'],
  REJECTED: ['PENDING'],
  ACTIVE: ['DISCONNECTED'],
  SUSPENDED: ['DISCONNECTED'],
  DISCONNECTED: [],
};

export const REINVITABLE_STATUSES: readonly ConnectionStatus[] = ['PENDING', 'REJECTED'];

/** Statuses where disconnect removes the profile and connection entirely. */
export const DELETE_ON_DISCONNECT_STATUSES: readonly ConnectionStatus[] = [
  'PENDING',
  'REJECTED',
  'DISCONNECTED',
];

export function canTransition(from: ConnectionStatus, to: ConnectionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertConnectionTransition(
  connection: TenantConnection,
  to: ConnectionStatus,
): void {
  if (!canTransition(connection.status, to)) {
    throw ConnectionErrors.transitionNotAllowed(connection.status, to, {
      connectionId: connection.id,
    });
  }
}

export function assertConnectionPending(connection: TenantConnection): void {
  if (connection.status !== 'PENDING') {
    throw ConnectionErrors.notPending({ connectionId: connection.id, status: connection.status });
  }
}

export function assertCanReinvite(connection: TenantConnection, maxRetries: number): void {
  if (!REINVITABLE_STATUSES.includes(connection.status)) {
    throw ConnectionErrors.reinviteNotAllowed(connection.status, { connectionId: connection.id });
  }
  if (connection.retryCount >= maxRetries) {
    throw ConnectionErrors.retryLimitReached(maxRetries, {
      connectionId: connection.id,
      retryCount: connection.retryCount,
    });
  }
}

/** Only the resolved target tenant may answer a request; everyone else sees NOT_FOUND. */
export function assertIsConnectionTarget(connection: TenantConnection, tenantId: string): void {
  if (connection.targetTenantId !== tenantId) {
    throw ConnectionErrors.connectionNotFound({ connectionId: connection.id });
  }
}

export type DisconnectOutcome = 'DELETE' | 'DISCONNECT';

export function decideDisconnect(connection: TenantConnection | undefined): DisconnectOutcome {
  if (!connection) return 'DELETE';
  if (DELETE_ON_DISCONNECT_STATUSES.includes(connection.status)) return 'DELETE';
  return 'DISCONNECT';
}
