/**
 * backend/src/modules/products/product.types.ts
 *
 * WHY:
 * - Product = brand-owned identity (SKU). ProductVersion = one passport snapshot.
 * - A version owns three child collections: BOM lines, supply-chain nodes, certificates.
 *
 * RULES:
 * - (productId, versionSequence, revision) identifies a version.
 *   A new sequence starts a new generation; a new revision is a rework of a rejected one.
 * - Children are always replaced as a whole (never patched row by row).
 */

export const VERSION_STATUSES = [
  'WORKING_DRAFT',
  'SUBMITTED',
  'APPROVED',
  'REVISION_REQUIRED',
  'REJECTED',
  'CANCELLED',
] as const;
export type VersionStatus = (typeof VERSION_STATUSES)[number];

export const LIFECYCLE_STATUSES = ['ACTIVE', 'ARCHIVED'] as const;
export type LifecycleStatus = (typeof LIFECYCLE_STATUSES)[number];

export type Product = {
  id: string;
  tenantId: string;
  sku: string;
  gtin: string | null;
  name: string;
  category: string;
  description: string | null;
  lifecycleStatus: LifecycleStatus;

  createdAt: Date;
  updatedAt: Date;
};

export type NewProduct = Pick<
  Product,
  'tenantId' | 'sku' | 'gtin' | 'name' | 'category' | 'description'
>;

export type ProductPatch = Partial<
  Pick<Product, 'gtin' | 'name' | 'category' | 'description' | 'lifecycleStatus'>
>;

export type ProductMedia = {
  id: string;
  productId: string;
  fileUrl: string;
  fileName: string | null;
  contentType: string | null;
  isMain: boolean;
  displayOrder: number;
  isDeleted: boolean;
  createdAt: Date;
};

export type NewProductMedia = Pick<
  ProductMedia,
  'productId' | 'fileUrl' | 'fileName' | 'contentType' | 'isMain' | 'displayOrder'
>;

export type VersionMetadata = {
  productName: string;
  category: string;
  description: string | null;
};

export type VersionScalars = {
  manufacturingCountry: string | null;
  totalCarbonFootprintKg: number | null;
  totalWaterUsageLiters: number | null;
  totalEnergyMj: number | null;
  recyclingInstructions: string | null;
  recyclabilityClass: string | null;
};

export type ProductVersion = VersionMetadata &
  VersionScalars & {
    id: string;
    productId: string;
    tenantId: string;
    versionSequence: number;
    revision: number;
    versionName: string;
    status: VersionStatus;
    parentVersionId: string | null;

    createdAt: Date;
    updatedAt: Date;
  };

export type NewProductVersion = Omit<ProductVersion, 'id' | 'createdAt' | 'updatedAt'>;

export type VersionPatch = Partial<
  VersionMetadata & VersionScalars & { versionName: string; status: VersionStatus }
>;

// ── Children ──────────────────────────────────────────────────

export type VersionMaterialInput = {
  materialId: string | null;
  materialDefinitionId: string | null;
  name: string;
  percentage: number;
  originCountry: string;
  transportMethod: string | null;
};

export type VersionSupplierInput = {
  supplierProfileId: string | null;
  name: string;
  role: string;
  country: string;
};

export type VersionCertificationInput = {
  certificationId: string | null;
  certificateDefinitionId: string | null;
  name: string;
  fileUrl: string;
  fileName: string;
  fileType: string;
  sourceArtifactId: string | null;
  validUntil: Date | null;
  referenceNumber: string | null;
};

type ChildRow = { id: string; versionId: string; sortOrder: number };

export type VersionMaterial = VersionMaterialInput & ChildRow;
export type VersionSupplier = VersionSupplierInput & ChildRow;
export type VersionCertification = VersionCertificationInput & ChildRow;

export type VersionChildrenInput = {
  materials: VersionMaterialInput[];
  suppliers: VersionSupplierInput[];
  certifications: VersionCertificationInput[];
};

export type VersionChildren = {
  materials: VersionMaterial[];
  suppliers: VersionSupplier[];
  certifications: VersionCertification[];
};

export type VersionWithChildren = ProductVersion & VersionChildren;

// ── Read models ───────────────────────────────────────────────

export type ProductListItem = Product & {
  latestVersion: Pick<
    ProductVersion,
    'id' | 'versionSequence' | 'revision' | 'versionName' | 'status'
  > | null;
  mainImageUrl: string | null;
};

export type ProductDetail = Product & {
  latestVersion: VersionWithChildren | null;
  versions: Pick<
    ProductVersion,
    'id' | 'versionSequence' | 'revision' | 'versionName' | 'status' | 'parentVersionId' | 'createdAt'
  >[];
  media: ProductMedia[];
  /** Status of the contribution request driving the latest version, if any. */
  contributionStatus: string | null;
};
