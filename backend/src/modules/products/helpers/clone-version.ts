/**
 * backend/src/modules/products/helpers/clone-version.ts
 *
 * WHY:
 * - Rejecting a submission must keep the reviewed data untouched and give the supplier
 *   a fresh draft to rework. Starting a new generation copies the last one forward.
 *
 * RULES:
 * - Pure: (version, children) -> { version, children }. No ids, no timestamps.
 * - Children are deep copies: the clone never shares an object with the source.
 * - The clone is always WORKING_DRAFT and points back at its source.
 */

import type {
  NewProductVersion,
  ProductVersion,
  VersionChildren,
  VersionChildrenInput,
} from '../product.types';

export type VersionClone = {
  version: NewProductVersion;
  children: VersionChildrenInput;
};

function copyChildren(children: VersionChildren): VersionChildrenInput {
  return {
    materials: children.materials.map((m) => ({
      materialId: m.materialId,
      materialDefinitionId: m.materialDefinitionId,
      name: m.name,
      percentage: m.percentage,
      originCountry: m.originCountry,
      transportMethod: m.transportMethod,
    })),
    suppliers: children.suppliers.map((s) => ({
      supplierProfileId: s.supplierProfileId,
      name: s.name,
      role: s.role,
      country: s.country,
    })),
    certifications: children.certifications.map((c) => ({
      certificationId: c.certificationId,
      certificateDefinitionId: c.certificateDefinitionId,
      name: c.name,
      fileUrl: c.fileUrl,
      fileName: c.fileName,
      fileType: c.fileType,
      sourceArtifactId: c.sourceArtifactId,
      validUntil: c.validUntil ? new Date(c.validUntil.getTime()) : null,
      referenceNumber: c.referenceNumber,
    })),
  };
}

function copyScalars(version: ProductVersion): Omit<
  NewProductVersion,
  'versionSequence' | 'revision' | 'versionName' | 'status' | 'parentVersionId'
> {
  return {
    productId: version.productId,
    tenantId: version.tenantId,
    productName: version.productName,
    category: version.category,
    description: version.description,
    manufacturingCountry: version.manufacturingCountry,
    totalCarbonFootprintKg: version.totalCarbonFootprintKg,
    totalWaterUsageLiters: version.totalWaterUsageLiters,
    totalEnergyMj: version.totalEnergyMj,
    recyclingInstructions: version.recyclingInstructions,
    recyclabilityClass: version.recyclabilityClass,
  };
}

/** Same sequence, revision + 1. Used when a submission is rejected. */
export function cloneVersionForRevision(
  version: ProductVersion,
  children: VersionChildren,
): VersionClone {
  return {
    version: {
      ...copyScalars(version),
      versionSequence: version.versionSequence,
      revision: version.revision + 1,
      versionName: version.versionName,
      status: 'WORKING_DRAFT',
      parentVersionId: version.id,
    },
    children: copyChildren(children),
  };
}

/** Sequence + 1, revision 1. Used when a brand starts the next generation. */
export function cloneForNextSequence(
  version: ProductVersion,
  children: VersionChildren,
  versionName?: string,
): VersionClone {
  const versionSequence = version.versionSequence + 1;

  return {
    version: {
      ...copyScalars(version),
      versionSequence,
      revision: 1,
      versionName: versionName ?? `Version ${versionSequence}`,
      status: 'WORKING_DRAFT',
      parentVersionId: version.id,
    },
    children: copyChildren(children),
  };
}
