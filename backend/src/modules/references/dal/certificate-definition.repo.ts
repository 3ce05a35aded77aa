/**
 * backend/src/modules/references/dal/certificate-definition.repo.ts
 *
 * WHY:
 * - Kysely implementation of the reference port for certificate definitions.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CertificateDefinitionsTable } from '../../../shared/db/tables';
import { toCertificateDefinition } from '../reference.queries';
import type {
  CertificateDefinition,
  CertificateDefinitionFields,
  CertificateDefinitionUniqueField,
} from '../reference.types';
import type { ReferenceRepo } from './reference.repo';

function toCertificateDefinitionUpdate(
  patch: Partial<CertificateDefinitionFields>,
): Updateable<CertificateDefinitionsTable> {
  const values: Updateable<CertificateDefinitionsTable> = { updated_at: new Date() };
  if (patch.name !== undefined) values.name = patch.name;
  if (patch.issuerAuthority !== undefined) values.issuer_authority = patch.issuerAuthority;
  if (patch.category !== undefined) values.category = patch.category;
  if (patch.description !== undefined) values.description = patch.description;
  return values;
}

export class SqlCertificateDefinitionRepo
  implements ReferenceRepo<CertificateDefinitionFields, CertificateDefinitionUniqueField>
{
  constructor(private readonly db: DbExecutor) {}

  async listVisible(tenantId: string): Promise<CertificateDefinition[]> {
    const rows = await this.db
      .selectFrom('certificate_definitions')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .orderBy('name')
      .execute();
    return rows.map(toCertificateDefinition);
  }

  async listSystem(): Promise<CertificateDefinition[]> {
    const rows = await this.db
      .selectFrom('certificate_definitions')
      .selectAll()
      .where('tenant_id', 'is', null)
      .orderBy('name')
      .execute();
    return rows.map(toCertificateDefinition);
  }

  async findById(id: string): Promise<CertificateDefinition | undefined> {
    const row = await this.db
      .selectFrom('certificate_definitions')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toCertificateDefinition(row) : undefined;
  }

  async findVisibleByField(
    tenantId: string,
    field: CertificateDefinitionUniqueField,
    value: string,
    excludeId?: string,
  ): Promise<CertificateDefinition | undefined> {
    let query = this.db
      .selectFrom('certificate_definitions')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .where((eb) => eb(eb.fn<string>('lower', [field]), '=', value.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toCertificateDefinition(row) : undefined;
  }

  async insert(
    tenantId: string | null,
    fields: CertificateDefinitionFields,
  ): Promise<CertificateDefinition> {
    const row = await this.db
      .insertInto('certificate_definitions')
      .values({
        tenant_id: tenantId,
        name: fields.name,
        issuer_authority: fields.issuerAuthority,
        category: fields.category,
        description: fields.description,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toCertificateDefinition(row);
  }

  async update(
    id: string,
    patch: Partial<CertificateDefinitionFields>,
  ): Promise<CertificateDefinition> {
    const row = await this.db
      .updateTable('certificate_definitions')
      .set(toCertificateDefinitionUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toCertificateDefinition(row);
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('certificate_definitions').where('id', '=', id).execute();
  }
}
