/**
 * backend/src/modules/references/reference.types.ts
 *
 * WHY:
 * - The reference library holds four kinds of lookup data that product versions link to.
 * - tenantId === null marks a System Global row, visible to everyone and read-only.
 *
 * RULES:
 * - Visibility for a tenant = System Global rows ∪ that tenant's own rows.
 * - Unique fields are compared case-insensitively across the visibility set.
 */

export type ReferenceOwnership = {
  id: string;
  tenantId: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type ReferenceItem<TFields> = ReferenceOwnership & TFields;

export type MaterialFields = {
  name: string;
  code: string;
  materialType: string | null;
  description: string | null;
};

export type CertificationFields = {
  name: string;
  code: string;
  issuer: string | null;
  description: string | null;
};

export type CertificateDefinitionFields = {
  name: string;
  issuerAuthority: string | null;
  category: string | null;
  description: string | null;
};

export type MaterialDefinitionFields = {
  name: string;
  code: string;
  materialType: string | null;
  defaultCarbonFootprint: number | null;
};

export type Material = ReferenceItem<MaterialFields>;
export type Certification = ReferenceItem<CertificationFields>;
export type CertificateDefinition = ReferenceItem<CertificateDefinitionFields>;
export type MaterialDefinition = ReferenceItem<MaterialDefinitionFields>;

export type MaterialUniqueField = 'code' | 'name';
export type CertificationUniqueField = 'code';
export type CertificateDefinitionUniqueField = 'name';
export type MaterialDefinitionUniqueField = 'code';

export type ReferenceEntityType =
  | 'Material'
  | 'Certification'
  | 'CertificateDefinition'
  | 'MaterialDefinition';

export type ReferenceKind<TField extends string> = {
  entityType: ReferenceEntityType;
  /** Human label used in messages ("material", "certificate definition"). */
  label: string;
  uniqueFields: readonly TField[];
};

export type LibraryOwner = 'SYSTEM' | 'TENANT';

export function ownerOf(item: ReferenceOwnership): LibraryOwner {
  return item.tenantId === null ? 'SYSTEM' : 'TENANT';
}
