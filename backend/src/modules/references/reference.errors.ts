/**
 * backend/src/modules/references/reference.errors.ts
 *
 * WHY:
 * - References module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Another tenant's row is reported exactly like a missing row (NOT_FOUND).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';
import type { LibraryOwner } from './reference.types';

const LIBRARY_NAMES: Record<LibraryOwner, string> = {
  SYSTEM: 'the System Global Library',
  TENANT: 'Your Custom Library',
};

export const ReferenceErrors = {
  notFound(label: string, meta?: AppErrorMeta) {
    return AppError.notFound(`${capitalize(label)} not found.`, meta);
  },

  systemReadOnly(label: string, meta?: AppErrorMeta) {
    return AppError.forbidden(
      `This ${label} belongs to the System Global Library and cannot be modified.`,
      meta,
    );
  },

  duplicate(label: string, field: string, value: string, owner: LibraryOwner, meta?: AppErrorMeta) {
    return AppError.conflict(
      `A ${label} with ${field} "${value}" already exists in ${LIBRARY_NAMES[owner]}.`,
      { field, owner, ...meta },
    );
  },

  inUse(label: string, linkCount: number, meta?: AppErrorMeta) {
    return AppError.conflict(
      `This ${label} is used by ${linkCount} product version entr${linkCount === 1 ? 'y' : 'ies'} and cannot be deleted.`,
      { linkCount, ...meta },
    );
  },
} as const;

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
