import { describe, it, expect } from 'vitest';
import {
  assertBrandCanEditVersion,
  assertCanStartNextVersion,
  pickLatestVersion,
} from '../../../src/modules/products/policies/version-state.policy';
import type { ProductVersion, VersionStatus } from '../../../src/modules/products/product.types';

function version(status: VersionStatus): ProductVersion {
  const at = new Date('2026-02-01T00:00:00Z');
  return {
    id: 'v1',
    productId: 'p1',
    tenantId: 't1',
    versionSequence: 1,
    revision: 1,
    versionName: 'Version 1',
    status,
    parentVersionId: null,
    productName: 'Tee',
    category: 'Apparel',
    description: null,
    manufacturingCountry: null,
    totalCarbonFootprintKg: null,
    totalWaterUsageLiters: null,
    totalEnergyMj: null,
    recyclingInstructions: null,
    recyclabilityClass: null,
    createdAt: at,
    updatedAt: at,
  };
}

describe('pickLatestVersion', () => {
  it('orders by sequence, then by revision', () => {
    const latest = pickLatestVersion([
      { versionSequence: 1, revision: 3 },
      { versionSequence: 2, revision: 1 },
      { versionSequence: 2, revision: 2 },
      { versionSequence: 1, revision: 1 },
    ]);
    expect(latest).toEqual({ versionSequence: 2, revision: 2 });
  });

  it('returns undefined for no versions', () => {
    expect(pickLatestVersion([])).toBeUndefined();
  });
});

describe('assertBrandCanEditVersion', () => {
  it('allows a working draft nobody else is filling in', () => {
    expect(() => assertBrandCanEditVersion(version('WORKING_DRAFT'), false)).not.toThrow();
  });

  it('refuses a draft driven by an open request', () => {
    expect(() => assertBrandCanEditVersion(version('WORKING_DRAFT'), true)).toThrowError(
      'This version is assigned to a supplier. Cancel the request to edit it.',
    );
  });

  it('refuses anything but a working draft', () => {
    expect(() => assertBrandCanEditVersion(version('SUBMITTED'), false)).toThrowError(
      'A SUBMITTED version cannot be edited.',
    );
  });
});

describe('assertCanStartNextVersion', () => {
  it('allows closed versions', () => {
    for (const status of ['APPROVED', 'REJECTED', 'CANCELLED'] as const) {
      expect(() => assertCanStartNextVersion(version(status))).not.toThrow();
    }
  });

  it('refuses while the latest version is still open', () => {
    expect(() => assertCanStartNextVersion(version('WORKING_DRAFT'))).toThrowError(
      'A new version can only be started once the latest one is closed (it is WORKING_DRAFT).',
    );
  });
});
