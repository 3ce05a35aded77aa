import { describe, it, expect } from 'vitest';
import { AppError } from '../../../src/shared/http/errors';
import {
  assertEditableByTenant,
  assertVisibleToTenant,
} from '../../../src/modules/references/policies/reference-ownership.policy';
import type { ReferenceOwnership } from '../../../src/modules/references/reference.types';

const at = new Date('2026-01-01T00:00:00Z');
const row = (tenantId: string | null): ReferenceOwnership => ({
  id: 'r1',
  tenantId,
  createdAt: at,
  updatedAt: at,
});

function statusOf(fn: () => void): number | null {
  try {
    fn();
    return null;
  } catch (err) {
    return err instanceof AppError ? err.status : -1;
  }
}

describe('assertEditableByTenant', () => {
  it('lets a tenant edit its own row', () => {
    expect(statusOf(() => assertEditableByTenant(row('t1'), 't1', 'material'))).toBeNull();
  });

  it('protects System Global rows with 403', () => {
    expect(() => assertEditableByTenant(row(null), 't1', 'material')).toThrowError(
      'This material belongs to the System Global Library and cannot be modified.',
    );
    expect(statusOf(() => assertEditableByTenant(row(null), 't1', 'material'))).toBe(403);
  });

  it('reports another tenant row as missing', () => {
    expect(() => assertEditableByTenant(row('t2'), 't1', 'certification')).toThrowError(
      'Certification not found.',
    );
    expect(statusOf(() => assertEditableByTenant(row('t2'), 't1', 'certification'))).toBe(404);
  });

  it('reports a missing row as 404', () => {
    expect(statusOf(() => assertEditableByTenant(undefined, 't1', 'material'))).toBe(404);
  });
});

describe('assertVisibleToTenant', () => {
  it('lets a tenant link System Global rows and its own rows', () => {
    expect(statusOf(() => assertVisibleToTenant(row(null), 't1', 'material'))).toBeNull();
    expect(statusOf(() => assertVisibleToTenant(row('t1'), 't1', 'material'))).toBeNull();
  });

  it('reports another tenant row and a missing row as 404', () => {
    expect(() => assertVisibleToTenant(row('t2'), 't1', 'material definition')).toThrowError(
      'Material definition not found.',
    );
    expect(statusOf(() => assertVisibleToTenant(undefined, 't1', 'material'))).toBe(404);
  });
});
