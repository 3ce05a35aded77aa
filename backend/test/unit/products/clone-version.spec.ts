import { describe, it, expect } from 'vitest';
import {
  cloneForNextSequence,
  cloneVersionForRevision,
} from '../../../src/modules/products/helpers/clone-version';
import type { ProductVersion, VersionChildren } from '../../../src/modules/products/product.types';

const at = new Date('2026-03-01T00:00:00Z');

const source: ProductVersion = {
  id: 'v-source',
  productId: 'p1',
  tenantId: 't1',
  versionSequence: 2,
  revision: 1,
  versionName: 'Spring',
  status: 'REVISION_REQUIRED',
  parentVersionId: null,
  productName: 'Tee',
  category: 'Apparel',
  description: 'Organic tee',
  manufacturingCountry: 'PT',
  totalCarbonFootprintKg: 4.2,
  totalWaterUsageLiters: 900,
  totalEnergyMj: null,
  recyclingInstructions: 'Textile bin',
  recyclabilityClass: 'B',
  createdAt: at,
  updatedAt: at,
};

const children: VersionChildren = {
  materials: [
    {
      id: 'm1',
      versionId: 'v-source',
      sortOrder: 0,
      materialId: null,
      materialDefinitionId: null,
      name: 'Cotton',
      percentage: 95,
      originCountry: 'IN',
      transportMethod: 'Sea',
    },
  ],
  suppliers: [
    {
      id: 's1',
      versionId: 'v-source',
      sortOrder: 0,
      supplierProfileId: 'sp1',
      name: 'Spinner',
      role: 'Yarn',
      country: 'IN',
    },
  ],
  certifications: [
    {
      id: 'c1',
      versionId: 'v-source',
      sortOrder: 0,
      certificationId: null,
      certificateDefinitionId: null,
      name: 'GOTS',
      fileUrl: 'http://files.test/gots.pdf',
      fileName: 'gots.pdf',
      fileType: 'application/pdf',
      sourceArtifactId: null,
      validUntil: new Date('2027-01-01T00:00:00Z'),
      referenceNumber: 'G-1',
    },
  ],
};

describe('cloneVersionForRevision', () => {
  it('bumps the revision and reopens the draft', () => {
    const clone = cloneVersionForRevision(source, children);

    expect(clone.version.versionSequence).toBe(2);
    expect(clone.version.revision).toBe(2);
    expect(clone.version.versionName).toBe('Spring');
    expect(clone.version.status).toBe('WORKING_DRAFT');
    expect(clone.version.parentVersionId).toBe('v-source');
    expect(clone.version.totalCarbonFootprintKg).toBe(4.2);
  });

  it('copies children without row identity', () => {
    const clone = cloneVersionForRevision(source, children);

    expect(clone.children.materials).toEqual([
      {
        materialId: null,
        materialDefinitionId: null,
        name: 'Cotton',
        percentage: 95,
        originCountry: 'IN',
        transportMethod: 'Sea',
      },
    ]);
    expect(clone.children.suppliers[0]?.supplierProfileId).toBe('sp1');
    expect(clone.children.certifications[0]?.validUntil).toEqual(
      new Date('2027-01-01T00:00:00Z'),
    );
    expect(clone.children.certifications[0]?.validUntil).not.toBe(
      children.certifications[0]?.validUntil,
    );
  });
});

describe('cloneForNextSequence', () => {
  it('starts a new generation at revision 1', () => {
    const clone = cloneForNextSequence(source, children);

    expect(clone.version.versionSequence).toBe(3);
    expect(clone.version.revision).toBe(1);
    expect(clone.version.versionName).toBe('Version 3');
  });

  it('takes a given version name', () => {
    expect(cloneForNextSequence(source, children, 'Autumn').version.versionName).toBe('Autumn');
  });
});
