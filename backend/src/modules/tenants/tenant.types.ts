/**
 * backend/src/modules/tenants/tenant.types.ts
 *
 * WHY:
 * - Tenant = Organization. Every row of business data belongs to exactly one tenant.
 * - Type decides what an organization may do (create products, receive requests).
 *
 * RULES:
 * - Type is fixed at signup and never changes.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 */

export const TENANT_TYPES = ['BRAND', 'SUPPLIER', 'PERSONAL', 'SYSTEM_ADMIN', 'HYBRID'] as const;
export type TenantType = (typeof TENANT_TYPES)[number];

/** Types a visitor may pick at public signup. */
export const SIGNUP_TENANT_TYPES = ['BRAND', 'SUPPLIER', 'HYBRID'] as const;
export type SignupTenantType = (typeof SIGNUP_TENANT_TYPES)[number];

export type TenantStatus = 'ACTIVE' | 'SUSPENDED';

export type Tenant = {
  id: string;
  name: string;
  slug: string;
  type: TenantType;
  status: TenantStatus;
  locationCountry: string | null;

  createdAt: Date;
  updatedAt: Date;
};

export type NewTenant = {
  name: string;
  slug: string;
  type: TenantType;
  locationCountry: string | null;
};

/** Public card shown in the connection directory. */
export type DirectoryEntry = {
  id: string;
  name: string;
  slug: string;
  type: TenantType;
  locationCountry: string | null;
};
