/**
 * backend/src/shared/db/tables.ts
 *
 * WHY:
 * - Kysely needs one Database interface describing every table it can query.
 * - Kept next to the migrations: when a migration changes a table, this file changes
 *   in the same commit.
 *
 * RULES:
 * - Column names are snake_case exactly as in the migrations.
 * - Generated<T> for DB defaults (ids, timestamps, counters).
 * - Status columns are plain strings here; modules parse them into unions (queries).
 * - No domain types imported here.
 */

import type { ColumnType, Generated } from 'kysely';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

type Timestamp = ColumnType<Date, Date | string | undefined, Date | string>;
type CreatedAt = Generated<Date>;

// ── Identity ──────────────────────────────────────────────────

export interface TenantsTable {
  id: Generated<string>;
  name: string;
  slug: string;
  type: string;
  status: Generated<string>;
  location_country: string | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface UsersTable {
  id: Generated<string>;
  email: string;
  password_hash: string;
  first_name: string;
  last_name: string;
  is_active: Generated<boolean>;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface MembershipsTable {
  id: Generated<string>;
  tenant_id: string;
  user_id: string;
  role: string;
  status: string;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

// ── Connections ───────────────────────────────────────────────

export interface TenantConnectionsTable {
  id: Generated<string>;
  requester_tenant_id: string;
  target_tenant_id: string | null;
  invitation_email: string | null;
  status: string;
  invitation_token_hash: string | null;
  request_note: string | null;
  retry_count: Generated<number>;
  last_invited_at: Timestamp;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface SupplierProfilesTable {
  id: Generated<string>;
  tenant_id: string;
  connection_id: string | null;
  name: string;
  description: string | null;
  location_country: string | null;
  contact_name: string | null;
  contact_email: string | null;

  // denormalized from tenant_connections (written by syncProfile only)
  supplier_tenant_id: string | null;
  slug: string | null;
  invitation_email: string | null;
  connection_status: string | null;
  retry_count: Generated<number>;

  created_at: CreatedAt;
  updated_at: Timestamp;
}

// ── Reference library (tenant_id NULL = System Global) ────────

export interface MaterialsTable {
  id: Generated<string>;
  tenant_id: string | null;
  name: string;
  code: string;
  material_type: string | null;
  description: string | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface CertificationsTable {
  id: Generated<string>;
  tenant_id: string | null;
  name: string;
  code: string;
  issuer: string | null;
  description: string | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface CertificateDefinitionsTable {
  id: Generated<string>;
  tenant_id: string | null;
  name: string;
  issuer_authority: string | null;
  category: string | null;
  description: string | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface MaterialDefinitionsTable {
  id: Generated<string>;
  tenant_id: string | null;
  name: string;
  code: string;
  material_type: string | null;
  default_carbon_footprint: number | null;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

// ── Products ──────────────────────────────────────────────────

export interface ProductsTable {
  id: Generated<string>;
  tenant_id: string;
  sku: string;
  gtin: string | null;
  name: string;
  category: string;
  description: string | null;
  lifecycle_status: Generated<string>;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface ProductMediaTable {
  id: Generated<string>;
  product_id: string;
  file_url: string;
  file_name: string | null;
  content_type: string | null;
  is_main: boolean;
  display_order: number;
  is_deleted: Generated<boolean>;
  created_at: CreatedAt;
}

export interface ProductVersionsTable {
  id: Generated<string>;
  product_id: string;
  tenant_id: string;
  version_sequence: number;
  revision: number;
  version_name: string;
  status: string;
  parent_version_id: string | null;

  product_name: string;
  category: string;
  description: string | null;

  manufacturing_country: string | null;
  total_carbon_footprint_kg: number | null;
  total_water_usage_liters: number | null;
  total_energy_mj: number | null;
  recycling_instructions: string | null;
  recyclability_class: string | null;

  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface VersionMaterialsTable {
  id: Generated<string>;
  version_id: string;
  material_id: string | null;
  material_definition_id: string | null;
  name: string;
  percentage: number;
  origin_country: string;
  transport_method: string | null;
  sort_order: number;
  created_at: CreatedAt;
}

export interface VersionSuppliersTable {
  id: Generated<string>;
  version_id: string;
  supplier_profile_id: string | null;
  name: string;
  role: string;
  country: string;
  sort_order: number;
  created_at: CreatedAt;
}

export interface VersionCertificationsTable {
  id: Generated<string>;
  version_id: string;
  certification_id: string | null;
  certificate_definition_id: string | null;
  name: string;
  file_url: string;
  file_name: string;
  file_type: string;
  source_artifact_id: string | null;
  valid_until: ColumnType<Date | null, Date | string | null, Date | string | null>;
  reference_number: string | null;
  sort_order: number;
  created_at: CreatedAt;
}

// ── Contributions ─────────────────────────────────────────────

export interface SupplierArtifactsTable {
  id: Generated<string>;
  tenant_id: string;
  kind: string;
  file_name: string;
  file_url: string;
  content_type: string;
  size_bytes: number;
  created_at: CreatedAt;
}

export interface ContributionRequestsTable {
  id: Generated<string>;
  brand_tenant_id: string;
  supplier_tenant_id: string;
  supplier_profile_id: string | null;
  product_id: string;
  initial_version_id: string;
  current_version_id: string;
  status: string;
  due_date: ColumnType<Date | null, Date | string | null, Date | string | null>;
  request_note: string | null;
  created_by_user_id: string;
  created_at: CreatedAt;
  updated_at: Timestamp;
}

export interface CollaborationCommentsTable {
  id: Generated<string>;
  request_id: string;
  author_user_id: string;
  author_tenant_id: string;
  body: string;
  is_rejection_reason: boolean;
  created_at: CreatedAt;
}

// ── Audit ─────────────────────────────────────────────────────

export interface AuditEventsTable {
  id: Generated<string>;
  tenant_id: string | null;
  user_id: string | null;
  request_id: string | null;
  entity_type: string;
  entity_id: string;
  action: string;
  changes: ColumnType<JsonObject, string, string>;
  created_at: CreatedAt;
}

export interface Database {
  tenants: TenantsTable;
  users: UsersTable;
  memberships: MembershipsTable;

  tenant_connections: TenantConnectionsTable;
  supplier_profiles: SupplierProfilesTable;

  materials: MaterialsTable;
  certifications: CertificationsTable;
  certificate_definitions: CertificateDefinitionsTable;
  material_definitions: MaterialDefinitionsTable;

  products: ProductsTable;
  product_media: ProductMediaTable;
  product_versions: ProductVersionsTable;
  version_materials: VersionMaterialsTable;
  version_suppliers: VersionSuppliersTable;
  version_certifications: VersionCertificationsTable;

  supplier_artifacts: SupplierArtifactsTable;
  contribution_requests: ContributionRequestsTable;
  collaboration_comments: CollaborationCommentsTable;

  audit_events: AuditEventsTable;
}
