/**
 * backend/src/modules/products/product.queries.ts
 *
 * WHY:
 * - Shapes product, media, version and child rows into domain types.
 *
 * RULES:
 * - Pure mapping only.
 * - Unknown version statuses map to CANCELLED (never editable).
 */

import type { Selectable } from 'kysely';
import type {
  ProductMediaTable,
  ProductsTable,
  ProductVersionsTable,
  VersionCertificationsTable,
  VersionMaterialsTable,
  VersionSuppliersTable,
} from '../../shared/db/tables';
import {
  VERSION_STATUSES,
  type LifecycleStatus,
  type Product,
  type ProductMedia,
  type ProductVersion,
  type VersionCertification,
  type VersionMaterial,
  type VersionStatus,
  type VersionSupplier,
} from './product.types';

export function parseVersionStatus(value: string): VersionStatus {
  return VERSION_STATUSES.find((s) => s === value) ?? 'CANCELLED';
}

export function parseLifecycleStatus(value: string): LifecycleStatus {
  if (value === 'ACTIVE') return value;
  return 'ARCHIVED';
}

export function toProduct(row: Selectable<ProductsTable>): Product {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    sku: row.sku,
    gtin: row.gtin,
    name: row.name,
    category: row.category,
    description: row.description,
    lifecycleStatus: parseLifecycleStatus(row.lifecycle_status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toProductMedia(row: Selectable<ProductMediaTable>): ProductMedia {
  return {
    id: row.id,
    productId: row.product_id,
    fileUrl: row.file_url,
    fileName: row.file_name,
    contentType: row.content_type,
    isMain: row.is_main,
    displayOrder: row.display_order,
    isDeleted: row.is_deleted,
    createdAt: row.created_at,
  };
}

export function toProductVersion(row: Selectable<ProductVersionsTable>): ProductVersion {
  return {
    id: row.id,
    productId: row.product_id,
    tenantId: row.tenant_id,
    versionSequence: row.version_sequence,
    revision: row.revision,
    versionName: row.version_name,
    status: parseVersionStatus(row.status),
    parentVersionId: row.parent_version_id,

    productName: row.product_name,
    category: row.category,
    description: row.description,

    manufacturingCountry: row.manufacturing_country,
    totalCarbonFootprintKg: row.total_carbon_footprint_kg,
    totalWaterUsageLiters: row.total_water_usage_liters,
    totalEnergyMj: row.total_energy_mj,
    recyclingInstructions: row.recycling_instructions,
    recyclabilityClass: row.recyclability_class,

    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toVersionMaterial(row: Selectable<VersionMaterialsTable>): VersionMaterial {
  return {
    id: row.id,
    versionId: row.version_id,
    sortOrder: row.sort_order,
    materialId: row.material_id,
    materialDefinitionId: row.material_definition_id,
    name: row.name,
    percentage: row.percentage,
    originCountry: row.origin_country,
    transportMethod: row.transport_method,
  };
}

export function toVersionSupplier(row: Selectable<VersionSuppliersTable>): VersionSupplier {
  return {
    id: row.id,
    versionId: row.version_id,
    sortOrder: row.sort_order,
    supplierProfileId: row.supplier_profile_id,
    name: row.name,
    role: row.role,
    country: row.country,
  };
}

export function toVersionCertification(
  row: Selectable<VersionCertificationsTable>,
): VersionCertification {
  return {
    id: row.id,
    versionId: row.version_id,
    sortOrder: row.sort_order,
    certificationId: row.certification_id,
    certificateDefinitionId: row.certificate_definition_id,
    name: row.name,
    fileUrl: row.file_url,
    fileName: row.file_name,
    fileType: row.file_type,
    sourceArtifactId: row.source_artifact_id,
    validUntil: row.valid_until,
    referenceNumber: row.reference_number,
  };
}
