/**
 * backend/src/modules/references/dal/reference.repo.ts
 *
 * WHY:
 * - One persistence port shape for all four reference kinds, so the library service
 *   is written once.
 *
 * RULES:
 * - listVisible / findVisibleByField only ever see System Global + the given tenant.
 * - findVisibleByField compares case-insensitively.
 * - insert with tenantId null is for seeding only; services always pass the acting tenant.
 */

import type { ReferenceItem } from '../reference.types';

export interface ReferenceRepo<TFields, TField extends string> {
  listVisible(tenantId: string): Promise<ReferenceItem<TFields>[]>;
  /** System Global rows only (seeding). */
  listSystem(): Promise<ReferenceItem<TFields>[]>;
  findById(id: string): Promise<ReferenceItem<TFields> | undefined>;
  findVisibleByField(
    tenantId: string,
    field: TField,
    value: string,
    excludeId?: string,
  ): Promise<ReferenceItem<TFields> | undefined>;
  insert(tenantId: string | null, fields: TFields): Promise<ReferenceItem<TFields>>;
  update(id: string, patch: Partial<TFields>): Promise<ReferenceItem<TFields>>;
  delete(id: string): Promise<void>;
}
