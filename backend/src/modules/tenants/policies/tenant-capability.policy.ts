/**
 * backend/src/modules/tenants/policies/tenant-capability.policy.ts
 *
 * WHY:
 * - "Can this organization act as a brand / as a supplier?" is asked by connections,
 *   products and contributions. One answer, one place.
 *
 * RULES:
 * - Pure functions only.
 * - HYBRID is both brand-capable and supplier-capable.
 */

import { TenantErrors } from '../tenant.errors';
import type { Tenant, TenantType } from '../tenant.types';

export const BRAND_CAPABLE_TYPES: readonly TenantType[] = ['BRAND', 'HYBRID'];
export const SUPPLIER_CAPABLE_TYPES: readonly TenantType[] = ['SUPPLIER', 'HYBRID'];

export function isBrandCapable(type: TenantType): boolean {
  return BRAND_CAPABLE_TYPES.includes(type);
}

export function isSupplierCapable(type: TenantType): boolean {
  return SUPPLIER_CAPABLE_TYPES.includes(type);
}

export function assertTenantExists(
  tenant: Tenant | undefined,
  tenantId: string,
): asserts tenant is Tenant {
  if (!tenant) throw TenantErrors.tenantNotFound({ tenantId });
}

export function assertTenantIsActive(tenant: Tenant): void {
  if (tenant.status !== 'ACTIVE') {
    throw TenantErrors.tenantSuspended({ tenantId: tenant.id });
  }
}

export function assertBrandCapable(tenant: Tenant): void {
  if (!isBrandCapable(tenant.type)) {
    throw TenantErrors.notBrand({ tenantId: tenant.id, type: tenant.type });
  }
}
