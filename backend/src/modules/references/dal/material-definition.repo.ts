/**
 * backend/src/modules/references/dal/material-definition.repo.ts
 *
 * WHY:
 * - Kysely implementation of the reference port for material definitions.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MaterialDefinitionsTable } from '../../../shared/db/tables';
import { toMaterialDefinition } from '../reference.queries';
import type {
  MaterialDefinition,
  MaterialDefinitionFields,
  MaterialDefinitionUniqueField,
} from '../reference.types';
import type { ReferenceRepo } from './reference.repo';

function toMaterialDefinitionUpdate(
  patch: Partial<MaterialDefinitionFields>,
): Updateable<MaterialDefinitionsTable> {
  const values: Updateable<MaterialDefinitionsTable> = { updated_at: new Date() };
  if (patch.name !== undefined) values.name = patch.name;
  if (patch.code !== undefined) values.code = patch.code;
  if (patch.materialType !== undefined) values.material_type = patch.materialType;
  if (patch.defaultCarbonFootprint !== undefined) {
    values.default_carbon_footprint = patch.defaultCarbonFootprint;
  }
  return values;
}

export class SqlMaterialDefinitionRepo
  implements ReferenceRepo<MaterialDefinitionFields, MaterialDefinitionUniqueField>
{
  constructor(private readonly db: DbExecutor) {}

  async listVisible(tenantId: string): Promise<MaterialDefinition[]> {
    const rows = await this.db
      .selectFrom('material_definitions')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .orderBy('name')
      .execute();
    return rows.map(toMaterialDefinition);
  }

  async listSystem(): Promise<MaterialDefinition[]> {
    const rows = await this.db
      .selectFrom('material_definitions')
      .selectAll()
      .where('tenant_id', 'is', null)
      .orderBy('name')
      .execute();
    return rows.map(toMaterialDefinition);
  }

  async findById(id: string): Promise<MaterialDefinition | undefined> {
    const row = await this.db
      .selectFrom('material_definitions')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toMaterialDefinition(row) : undefined;
  }

  async findVisibleByField(
    tenantId: string,
    field: MaterialDefinitionUniqueField,
    value: string,
    excludeId?: string,
  ): Promise<MaterialDefinition | undefined> {
    let query = this.db
      .selectFrom('material_definitions')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .where((eb) => eb(eb.fn<string>('lower', [field]), '=', value.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toMaterialDefinition(row) : undefined;
  }

  async insert(
    tenantId: string | null,
    fields: MaterialDefinitionFields,
  ): Promise<MaterialDefinition> {
    const row = await this.db
      .insertInto('material_definitions')
      .values({
        tenant_id: tenantId,
        name: fields.name,
        code: fields.code,
        material_type: fields.materialType,
        default_carbon_footprint: fields.defaultCarbonFootprint,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMaterialDefinition(row);
  }

  async update(id: string, patch: Partial<MaterialDefinitionFields>): Promise<MaterialDefinition> {
    const row = await this.db
      .updateTable('material_definitions')
      .set(toMaterialDefinitionUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMaterialDefinition(row);
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('material_definitions').where('id', '=', id).execute();
  }
}
