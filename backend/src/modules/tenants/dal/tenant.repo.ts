/**
 * backend/src/modules/tenants/dal/tenant.repo.ts
 *
 * WHY:
 * - Persistence port for tenants + its Kysely implementation.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - No policies.
 * - Name lookups are case-insensitive.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { toTenant } from '../tenant.queries';
import type { NewTenant, Tenant, TenantType } from '../tenant.types';

export type DirectorySearch = {
  query: string;
  types: readonly TenantType[];
  excludeTenantId: string;
  limit: number;
};

export interface TenantRepo {
  findById(id: string): Promise<Tenant | undefined>;
  findManyByIds(ids: readonly string[]): Promise<Tenant[]>;
  findBySlug(slug: string): Promise<Tenant | undefined>;
  findByName(name: string): Promise<Tenant | undefined>;
  slugExists(slug: string): Promise<boolean>;
  insert(input: NewTenant): Promise<Tenant>;
  search(params: DirectorySearch): Promise<Tenant[]>;
}

export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export class SqlTenantRepo implements TenantRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<Tenant | undefined> {
    const row = await this.db.selectFrom('tenants').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toTenant(row) : undefined;
  }

  async findManyByIds(ids: readonly string[]): Promise<Tenant[]> {
    if (ids.length === 0) return [];
    const rows = await this.db.selectFrom('tenants').selectAll().where('id', 'in', [...ids]).execute();
    return rows.map(toTenant);
  }

  async findBySlug(slug: string): Promise<Tenant | undefined> {
    const row = await this.db
      .selectFrom('tenants')
      .selectAll()
      .where('slug', '=', slug.toLowerCase())
      .executeTakeFirst();
    return row ? toTenant(row) : undefined;
  }

  async findByName(name: string): Promise<Tenant | undefined> {
    const row = await this.db
      .selectFrom('tenants')
      .selectAll()
      .where((eb) => eb(eb.fn<string>('lower', ['name']), '=', name.toLowerCase()))
      .executeTakeFirst();
    return row ? toTenant(row) : undefined;
  }

  async slugExists(slug: string): Promise<boolean> {
    const row = await this.db
      .selectFrom('tenants')
      .select('id')
      .where('slug', '=', slug)
      .executeTakeFirst();
    return row !== undefined;
  }

  async insert(input: NewTenant): Promise<Tenant> {
    const row = await this.db
      .insertInto('tenants')
      .values({
        name: input.name,
        slug: input.slug,
        type: input.type,
        location_country: input.locationCountry,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toTenant(row);
  }

  async search(params: DirectorySearch): Promise<Tenant[]> {
    const pattern = `%${escapeLike(params.query.trim())}%`;

    const rows = await this.db
      .selectFrom('tenants')
      .selectAll()
      .where('type', 'in', [...params.types])
      .where('status', '=', 'ACTIVE')
      .where('id', '!=', params.excludeTenantId)
      .where((eb) => eb.or([eb('name', 'ilike', pattern), eb('slug', 'ilike', pattern)]))
      .orderBy('name')
      .limit(params.limit)
      .execute();

    return rows.map(toTenant);
  }
}
