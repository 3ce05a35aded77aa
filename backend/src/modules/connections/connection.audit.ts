/**
 * src/modules/connections/connection.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Connections module.
 *
 * RULES:
 * - No DB access (records into AuditWriter).
 * - Never include tokens or token hashes in changes.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { SupplierProfile, TenantConnection } from './connection.types';

export function auditConnectionCreated(
  writer: AuditWriter,
  data: { connection: TenantConnection; profile: SupplierProfile },
): void {
  writer.record('TenantConnection', data.connection.id, 'CREATE', {
    targetTenantId: data.connection.targetTenantId,
    invitationEmail: data.connection.invitationEmail,
    status: data.connection.status,
  });
  writer.record('SupplierProfile', data.profile.id, 'CREATE', {
    name: data.profile.name,
    connectionId: data.connection.id,
  });
}

export function auditConnectionStatusChanged(
  writer: AuditWriter,
  data: { before: TenantConnection; after: TenantConnection; action: string },
): void {
  writer.record('TenantConnection', data.after.id, 'UPDATE', {
    action: data.action,
    fromStatus: data.before.status,
    toStatus: data.after.status,
    retryCount: data.after.retryCount,
  });
}

export function auditConnectionRemoved(
  writer: AuditWriter,
  data: { profile: SupplierProfile; connection: TenantConnection | undefined },
): void {
  writer.record('SupplierProfile', data.profile.id, 'DELETE', { name: data.profile.name });
  if (data.connection) {
    writer.record('TenantConnection', data.connection.id, 'DELETE', {
      status: data.connection.status,
    });
  }
}

export function auditProfileUpdated(
  writer: AuditWriter,
  data: { profileId: string; changes: Record<string, unknown> },
): void {
  writer.record('SupplierProfile', data.profileId, 'UPDATE', data.changes);
}
