import { describe, it, expect } from 'vitest';
import { findFreeSlug, slugify } from '../../../src/modules/tenants/helpers/slug';

describe('slugify', () => {
  it('lowercases and joins words with single dashes', () => {
    expect(slugify('Acme Clothing Co.')).toBe('acme-clothing-co');
    expect(slugify('  North -- Yarns  ')).toBe('north-yarns');
  });

  it('uses the fallback when nothing is left', () => {
    expect(slugify('!!!', () => 'org-fallback')).toBe('org-fallback');
  });

  it('generates an org- slug by default', () => {
    expect(slugify('***')).toMatch(/^org-[0-9a-f]{8}$/);
  });
});

describe('findFreeSlug', () => {
  it('returns the base when it is free', async () => {
    await expect(findFreeSlug('acme', async () => false)).resolves.toBe('acme');
  });

  it('appends the first free counter', async () => {
    const taken = new Set(['acme', 'acme-1', 'acme-2']);
    await expect(findFreeSlug('acme', async (s) => taken.has(s))).resolves.toBe('acme-3');
  });

  it('gives up after the attempt limit', async () => {
    await expect(findFreeSlug('acme', async () => true, 3)).resolves.toBeNull();
  });
});
