/**
 * backend/src/modules/references/dal/material.repo.ts
 *
 * WHY:
 * - Kysely implementation of the reference port for materials.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MaterialsTable } from '../../../shared/db/tables';
import { toMaterial } from '../reference.queries';
import type { Material, MaterialFields, MaterialUniqueField } from '../reference.types';
import type { ReferenceRepo } from './reference.repo';

function toMaterialUpdate(patch: Partial<MaterialFields>): Updateable<MaterialsTable> {
  const values: Updateable<MaterialsTable> = { updated_at: new Date() };
  if (patch.name !== undefined) values.name = patch.name;
  if (patch.code !== undefined) values.code = patch.code;
  if (patch.materialType !== undefined) values.material_type = patch.materialType;
  if (patch.description !== undefined) values.description = patch.description;
  return values;
}

export class SqlMaterialRepo implements ReferenceRepo<MaterialFields, MaterialUniqueField> {
  constructor(private readonly db: DbExecutor) {}

  async listVisible(tenantId: string): Promise<Material[]> {
    const rows = await this.db
      .selectFrom('materials')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .orderBy('name')
      .execute();
    return rows.map(toMaterial);
  }

  async listSystem(): Promise<Material[]> {
    const rows = await this.db
      .selectFrom('materials')
      .selectAll()
      .where('tenant_id', 'is', null)
      .orderBy('name')
      .execute();
    return rows.map(toMaterial);
  }

  async findById(id: string): Promise<Material | undefined> {
    const row = await this.db
      .selectFrom('materials')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toMaterial(row) : undefined;
  }

  async findVisibleByField(
    tenantId: string,
    field: MaterialUniqueField,
    value: string,
    excludeId?: string,
  ): Promise<Material | undefined> {
    let query = this.db
      .selectFrom('materials')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .where((eb) => eb(eb.fn<string>('lower', [field]), '=', value.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toMaterial(row) : undefined;
  }

  async insert(tenantId: string | null, fields: MaterialFields): Promise<Material> {
    const row = await this.db
      .insertInto('materials')
      .values({
        tenant_id: tenantId,
        name: fields.name,
        code: fields.code,
        material_type: fields.materialType,
        description: fields.description,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMaterial(row);
  }

  async update(id: string, patch: Partial<MaterialFields>): Promise<Material> {
    const row = await this.db
      .updateTable('materials')
      .set(toMaterialUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMaterial(row);
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('materials').where('id', '=', id).execute();
  }
}
