/**
 * backend/src/modules/connections/helpers/sync-profile.ts
 *
 * WHY:
 * - A SupplierProfile carries a denormalized copy of its connection for list views.
 *   Both rows change in the same unit of work, and only through this step.
 *
 * RULES:
 * - buildProfileSync is pure: (connection, target tenant) -> profile fields.
 * - syncProfile must be called after EVERY connection transition, inside the same tx.
 */

import type { Tenant } from '../../tenants/tenant.types';
import type { Repos } from '../../_shared/persistence/repos';
import type { ProfileSyncFields, TenantConnection } from '../connection.types';

export function buildProfileSync(
  connection: TenantConnection,
  target: Tenant | undefined,
): ProfileSyncFields {
  return {
    connectionStatus: connection.status,
    retryCount: connection.retryCount,
    invitationEmail: connection.invitationEmail,
    supplierTenantId: connection.targetTenantId,
    slug: target?.slug ?? null,
  };
}

export async function syncProfile(
  repos: Pick<Repos, 'tenants' | 'supplierProfiles'>,
  connection: TenantConnection,
): Promise<void> {
  const target = connection.targetTenantId
    ? await repos.tenants.findById(connection.targetTenantId)
    : undefined;

  await repos.supplierProfiles.applySync(connection.id, buildProfileSync(connection, target));
}
