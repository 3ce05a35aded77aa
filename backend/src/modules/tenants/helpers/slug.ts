/**
 * backend/src/modules/tenants/helpers/slug.ts
 *
 * WHY:
 * - The slug is an organization's public handle (directory search, connection requests).
 *
 * RULES:
 * - 'Acme Clothing Co.' -> 'acme-clothing-co'
 * - Name made only of symbols -> 'org-<8 hex>'.
 * - Collisions get '-1', '-2', ... (bounded).
 */

import { randomBytes } from 'node:crypto';

export const MAX_SLUG_ATTEMPTS = 100;

export function slugify(name: string, fallback: () => string = randomOrgSlug): string {
  const slug = name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug || fallback();
}

function randomOrgSlug(): string {
  return `org-${randomBytes(4).toString('hex')}`;
}

/**
 * Returns the first free candidate: base, base-1, base-2, ...
 * Returns null when every attempt is taken (caller decides the error).
 */
export async function findFreeSlug(
  base: string,
  exists: (slug: string) => Promise<boolean>,
  maxAttempts = MAX_SLUG_ATTEMPTS,
): Promise<string | null> {
  for (let attempt = 0; attempt <= maxAttempts; attempt++) {
    const candidate = attempt === 0 ? base : `${base}-${attempt}`;
    if (!(await exists(candidate))) return candidate;
  }
  return null;
}
