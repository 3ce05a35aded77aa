/**
 * backend/src/modules/references/policies/reference-ownership.policy.ts
 *
 * WHY:
 * - Who may change a reference row is the heart of the library. Pure + unit-tested.
 *
 * RULES:
 * - Missing row -> NOT_FOUND.
 * - System Global row -> FORBIDDEN (never mutated through tenant operations).
 * - Another tenant's row -> NOT_FOUND (existence is not revealed).
 * - Links from version entries may point at System Global or own rows only.
 */

import { ReferenceErrors } from '../reference.errors';
import type { ReferenceOwnership } from '../reference.types';

export function assertEditableByTenant<T extends ReferenceOwnership>(
  item: T | undefined,
  tenantId: string,
  label: string,
): asserts item is T {
  if (!item) throw ReferenceErrors.notFound(label);

  if (item.tenantId === null) {
    throw ReferenceErrors.systemReadOnly(label, { id: item.id });
  }

  if (item.tenantId !== tenantId) {
    throw ReferenceErrors.notFound(label, { id: item.id });
  }
}

/**
 * Linking (not editing) a row: System Global rows and the tenant's own rows are fine;
 * anything else reads as missing.
 */
export function assertVisibleToTenant<T extends ReferenceOwnership>(
  item: T | undefined,
  tenantId: string,
  label: string,
  meta?: Record<string, unknown>,
): asserts item is T {
  if (!item || (item.tenantId !== null && item.tenantId !== tenantId)) {
    throw ReferenceErrors.notFound(label, meta);
  }
}
