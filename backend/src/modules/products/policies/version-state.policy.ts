/**
 * backend/src/modules/products/policies/version-state.policy.ts
 *
 * WHY:
 * - Which version a brand may still edit, and when a new generation may start.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Only WORKING_DRAFT is editable, and only while no supplier request drives it.
 * - A new sequence starts from a closed latest version (APPROVED, REJECTED, CANCELLED).
 */

import { ProductErrors } from '../product.errors';
import type { ProductVersion, VersionStatus } from '../product.types';

export const CLOSED_VERSION_STATUSES: readonly VersionStatus[] = [
  'APPROVED',
  'REJECTED',
  'CANCELLED',
];

export function assertVersionIsWorkingDraft(version: ProductVersion): void {
  if (version.status !== 'WORKING_DRAFT') {
    throw ProductErrors.versionNotEditable(version.status, { versionId: version.id });
  }
}

export function assertBrandCanEditVersion(
  version: ProductVersion,
  hasOpenContribution: boolean,
): void {
  assertVersionIsWorkingDraft(version);
  if (hasOpenContribution) {
    throw ProductErrors.versionUnderContribution({ versionId: version.id });
  }
}

export function assertCanStartNextVersion(latest: ProductVersion): void {
  if (!CLOSED_VERSION_STATUSES.includes(latest.status)) {
    throw ProductErrors.nextVersionNotAllowed(latest.status, { versionId: latest.id });
  }
}

/** Latest = highest sequence, then highest revision. */
export function pickLatestVersion<T extends Pick<ProductVersion, 'versionSequence' | 'revision'>>(
  versions: readonly T[],
): T | undefined {
  let latest: T | undefined;
  for (const v of versions) {
    if (
      !latest ||
      v.versionSequence > latest.versionSequence ||
      (v.versionSequence === latest.versionSequence && v.revision > latest.revision)
    ) {
      latest = v;
    }
  }
  return latest;
}
