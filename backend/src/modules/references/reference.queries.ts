/**
 * backend/src/modules/references/reference.queries.ts
 *
 * WHY:
 * - Shapes reference library rows into domain types.
 *
 * RULES:
 * - Pure mapping only.
 */

import type { Selectable } from 'kysely';
import type {
  CertificateDefinitionsTable,
  CertificationsTable,
  MaterialDefinitionsTable,
  MaterialsTable,
} from '../../shared/db/tables';
import type {
  CertificateDefinition,
  Certification,
  Material,
  MaterialDefinition,
} from './reference.types';

export function toMaterial(row: Selectable<MaterialsTable>): Material {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    code: row.code,
    materialType: row.material_type,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toCertification(row: Selectable<CertificationsTable>): Certification {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    code: row.code,
    issuer: row.issuer,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toCertificateDefinition(
  row: Selectable<CertificateDefinitionsTable>,
): CertificateDefinition {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    issuerAuthority: row.issuer_authority,
    category: row.category,
    description: row.description,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toMaterialDefinition(row: Selectable<MaterialDefinitionsTable>): MaterialDefinition {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    name: row.name,
    code: row.code,
    materialType: row.material_type,
    defaultCarbonFootprint: row.default_carbon_footprint,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}
