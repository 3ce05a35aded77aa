/**
 * backend/src/modules/connections/dal/supplier-profile.repo.ts
 *
 * WHY:
 * - Persistence port for supplier_profiles + its Kysely implementation.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - updateOwnFields never touches sync fields; applySync never touches own fields.
 * - Name lookups are case-insensitive and scoped to one brand.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { SupplierProfilesTable } from '../../../shared/db/tables';
import { toSupplierProfile } from '../connection.queries';
import type {
  NewSupplierProfile,
  ProfileOwnFields,
  ProfileSyncFields,
  SupplierProfile,
} from '../connection.types';

export interface SupplierProfileRepo {
  findById(id: string): Promise<SupplierProfile | undefined>;
  findByConnectionId(connectionId: string): Promise<SupplierProfile | undefined>;
  findByName(
    tenantId: string,
    name: string,
    excludeId?: string,
  ): Promise<SupplierProfile | undefined>;
  listForTenant(tenantId: string): Promise<SupplierProfile[]>;
  insert(input: NewSupplierProfile): Promise<SupplierProfile>;
  updateOwnFields(id: string, patch: Partial<ProfileOwnFields>): Promise<SupplierProfile>;
  applySync(connectionId: string, fields: ProfileSyncFields): Promise<void>;
  delete(id: string): Promise<void>;
}

function toOwnFieldsUpdate(patch: Partial<ProfileOwnFields>): Updateable<SupplierProfilesTable> {
  const values: Updateable<SupplierProfilesTable> = { updated_at: new Date() };

  if (patch.name !== undefined) values.name = patch.name;
  if (patch.description !== undefined) values.description = patch.description;
  if (patch.locationCountry !== undefined) values.location_country = patch.locationCountry;
  if (patch.contactName !== undefined) values.contact_name = patch.contactName;
  if (patch.contactEmail !== undefined) values.contact_email = patch.contactEmail;

  return values;
}

export class SqlSupplierProfileRepo implements SupplierProfileRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<SupplierProfile | undefined> {
    const row = await this.db
      .selectFrom('supplier_profiles')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toSupplierProfile(row) : undefined;
  }

  async findByConnectionId(connectionId: string): Promise<SupplierProfile | undefined> {
    const row = await this.db
      .selectFrom('supplier_profiles')
      .selectAll()
      .where('connection_id', '=', connectionId)
      .executeTakeFirst();
    return row ? toSupplierProfile(row) : undefined;
  }

  async findByName(
    tenantId: string,
    name: string,
    excludeId?: string,
  ): Promise<SupplierProfile | undefined> {
    let query = this.db
      .selectFrom('supplier_profiles')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .where((eb) => eb(eb.fn<string>('lower', ['name']), '=', name.toLowerCase()));

    if (excludeId) query = query.where('id', '!=', excludeId);

    const row = await query.executeTakeFirst();
    return row ? toSupplierProfile(row) : undefined;
  }

  async listForTenant(tenantId: string): Promise<SupplierProfile[]> {
    const rows = await this.db
      .selectFrom('supplier_profiles')
      .selectAll()
      .where('tenant_id', '=', tenantId)
      .orderBy('name')
      .execute();
    return rows.map(toSupplierProfile);
  }

  async insert(input: NewSupplierProfile): Promise<SupplierProfile> {
    const row = await this.db
      .insertInto('supplier_profiles')
      .values({
        tenant_id: input.tenantId,
        connection_id: input.connectionId,
        name: input.name,
        description: input.description,
        location_country: input.locationCountry,
        contact_name: input.contactName,
        contact_email: input.contactEmail,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toSupplierProfile(row);
  }

  async updateOwnFields(id: string, patch: Partial<ProfileOwnFields>): Promise<SupplierProfile> {
    const row = await this.db
      .updateTable('supplier_profiles')
      .set(toOwnFieldsUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toSupplierProfile(row);
  }

  async applySync(connectionId: string, fields: ProfileSyncFields): Promise<void> {
    await this.db
      .updateTable('supplier_profiles')
      .set({
        connection_status: fields.connectionStatus,
        retry_count: fields.retryCount,
        invitation_email: fields.invitationEmail,
        supplier_tenant_id: fields.supplierTenantId,
        slug: fields.slug,
        updated_at: new Date(),
      })
      .where('connection_id', '=', connectionId)
      .execute();
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('supplier_profiles').where('id', '=', id).execute();
  }
}
