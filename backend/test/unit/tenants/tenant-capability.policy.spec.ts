import { describe, it, expect } from 'vitest';
import {
  assertBrandCapable,
  assertTenantIsActive,
  isBrandCapable,
  isSupplierCapable,
} from '../../../src/modules/tenants/policies/tenant-capability.policy';
import type { Tenant } from '../../../src/modules/tenants/tenant.types';

function tenant(overrides: Partial<Tenant>): Tenant {
  const at = new Date('2026-01-01T00:00:00Z');
  return {
    id: 't1',
    name: 'Acme',
    slug: 'acme',
    type: 'BRAND',
    status: 'ACTIVE',
    locationCountry: 'DE',
    createdAt: at,
    updatedAt: at,
    ...overrides,
  };
}

describe('tenant capabilities', () => {
  it('HYBRID is both brand and supplier', () => {
    expect(isBrandCapable('HYBRID')).toBe(true);
    expect(isSupplierCapable('HYBRID')).toBe(true);
  });

  it('BRAND and SUPPLIER are one-sided', () => {
    expect(isSupplierCapable('BRAND')).toBe(false);
    expect(isBrandCapable('SUPPLIER')).toBe(false);
  });

  it('a supplier cannot act as a brand', () => {
    expect(() => assertBrandCapable(tenant({ type: 'SUPPLIER' }))).toThrowError(
      'Only brand organizations can perform this action.',
    );
  });

  it('a suspended organization is refused', () => {
    expect(() => assertTenantIsActive(tenant({ status: 'SUSPENDED' }))).toThrowError(
      'Organization is suspended',
    );
  });
});
