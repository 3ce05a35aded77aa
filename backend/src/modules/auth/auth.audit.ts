/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 * - Keeps audit payloads consistent per domain action.
 *
 * RULES:
 * - Each function maps one domain action to the events it produces.
 * - No DB access (records into AuditWriter; the service dispatches after commit).
 * - Never include passwords, hashes, or tokens in changes.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { User } from '../users/user.types';
import type { Tenant } from '../tenants/tenant.types';
import type { Membership } from '../memberships/membership.types';
import type { TenantConnection } from '../connections/connection.types';

export function auditSignup(
  writer: AuditWriter,
  data: {
    user: User;
    tenant: Tenant;
    membership: Membership;
    linkedConnections: readonly TenantConnection[];
  },
): void {
  writer.record('User', data.user.id, 'CREATE', {
    email: data.user.email,
    firstName: data.user.firstName,
    lastName: data.user.lastName,
  });

  writer.record('Tenant', data.tenant.id, 'CREATE', {
    name: data.tenant.name,
    slug: data.tenant.slug,
    type: data.tenant.type,
    locationCountry: data.tenant.locationCountry,
  });

  writer.record('TenantMember', data.membership.id, 'CREATE', {
    userId: data.membership.userId,
    tenantId: data.membership.tenantId,
    role: data.membership.role,
    status: data.membership.status,
  });

  for (const connection of data.linkedConnections) {
    writer.record('TenantConnection', connection.id, 'UPDATE', {
      targetTenantId: connection.targetTenantId,
      reason: 'linked_at_signup',
    });
  }
}
