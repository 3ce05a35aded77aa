/**
 * backend/src/modules/references/dal/certification.repo.ts
 *
 * WHY:
 * - Kysely implementation of the reference port for certifications.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { CertificationsTable } from '../../../shared/db/tables';
import { toCertification } from '../reference.queries';
import type {
  Certification,
  CertificationFields,
  CertificationUniqueField,
} from '../reference.types';
import type { ReferenceRepo } from './reference.repo';

function toCertificationUpdate(
  patch: Partial<CertificationFields>,
): Updateable<CertificationsTable> {
  const values: Updateable<CertificationsTable> = { updated_at: new Date() };
  if (patch.name !== undefined) values.name = patch.name;
  if (patch.code !== undefined) values.code = patch.code;
  if (patch.issuer !== undefined) values.issuer = patch.issuer;
  if (patch.description !== undefined) values.description = patch.description;
  return values;
}

export class SqlCertificationRepo
  implements ReferenceRepo<CertificationFields, CertificationUniqueField>
{
  constructor(private readonly db: DbExecutor) {}

  async listVisible(tenantId: string): Promise<Certification[]> {
    const rows = await this.db
      .selectFrom('certifications')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .orderBy('name')
      .execute();
    return rows.map(toCertification);
  }

  async listSystem(): Promise<Certification[]> {
    const rows = await this.db
      .selectFrom('certifications')
      .selectAll()
      .where('tenant_id', 'is', null)
      .orderBy('name')
      .execute();
    return rows.map(toCertification);
  }

  async findById(id: string): Promise<Certification | undefined> {
    const row = await this.db
      .selectFrom('certifications')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toCertification(row) : undefined;
  }

  async findVisibleByField(
    tenantId: string,
    field: CertificationUniqueField,
    value: string,
    excludeId?: string,
  ): Promise<Certification | undefined> {
    let query = this.db
      .selectFrom('certifications')
      .selectAll()
      .where((eb) => eb.or([eb('tenant_id', 'is', null), eb('tenant_id', '=', tenantId)]))
      .where((eb) => eb(eb.fn<string>('lower', [field]), '=', value.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toCertification(row) : undefined;
  }

  async insert(tenantId: string | null, fields: CertificationFields): Promise<Certification> {
    const row = await this.db
      .insertInto('certifications')
      .values({
        tenant_id: tenantId,
        name: fields.name,
        code: fields.code,
        issuer: fields.issuer,
        description: fields.description,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toCertification(row);
  }

  async update(id: string, patch: Partial<CertificationFields>): Promise<Certification> {
    const row = await this.db
      .updateTable('certifications')
      .set(toCertificationUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toCertification(row);
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('certifications').where('id', '=', id).execute();
  }
}
