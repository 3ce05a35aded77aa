/**
 * backend/src/modules/tenants/tenant.queries.ts
 *
 * WHY:
 * - Shapes DB rows into Tenant domain types.
 *
 * RULES:
 * - Pure mapping only.
 * - Unknown enum values fall back to the most restrictive value.
 */

import type { Selectable } from 'kysely';
import type { TenantsTable } from '../../shared/db/tables';
import { TENANT_TYPES, type Tenant, type TenantStatus, type TenantType } from './tenant.types';

export type TenantRow = Selectable<TenantsTable>;

export function parseTenantType(value: string): TenantType {
  const match = TENANT_TYPES.find((t) => t === value);
  return match ?? 'PERSONAL';
}

export function parseTenantStatus(value: string): TenantStatus {
  if (value === 'ACTIVE') return value;
  return 'SUSPENDED';
}

export function toTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    slug: row.slug,
    type: parseTenantType(row.type),
    status: parseTenantStatus(row.status),
    locationCountry: row.location_country,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
