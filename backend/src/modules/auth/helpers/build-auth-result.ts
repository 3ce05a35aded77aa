/**
 * src/modules/auth/helpers/build-auth-result.ts
 *
 * WHY:
 * - The AuthResult response shape is built identically by signup, login and
 *   switch-tenant.
 *
 * RULES:
 * - Pure function. No I/O.
 */

import type { AuthResult, TenantSummary } from '../auth.types';
import { toPublicUser, type User } from '../../users/user.types';
import type { Membership } from '../../memberships/membership.types';
import type { Tenant } from '../../tenants/tenant.types';

export function toTenantSummary(tenant: Tenant): TenantSummary {
  return { id: tenant.id, name: tenant.name, slug: tenant.slug, type: tenant.type };
}

export function buildAuthResult(params: {
  user: User;
  tenant: Tenant;
  membership: Pick<Membership, 'id' | 'role'>;
}): AuthResult {
  return {
    status: 'AUTHENTICATED',
    user: toPublicUser(params.user),
    tenant: toTenantSummary(params.tenant),
    membership: { id: params.membership.id, role: params.membership.role },
  };
}
