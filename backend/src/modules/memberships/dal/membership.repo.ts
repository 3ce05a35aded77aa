/**
 * backend/src/modules/memberships/dal/membership.repo.ts
 *
 * WHY:
 * - Persistence port for memberships + its Kysely implementation.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - No policies.
 * - listForUser returns oldest first (login picks the first ACTIVE one).
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { MembershipsTable } from '../../../shared/db/tables';
import type {
  Membership,
  MembershipRole,
  MembershipStatus,
  NewMembership,
} from '../membership.types';

type MembershipRow = Selectable<MembershipsTable>;

function parseRole(value: string): MembershipRole {
  if (value === 'ADMIN') return value;
  return 'MEMBER';
}

function parseStatus(value: string): MembershipStatus {
  if (value === 'ACTIVE' || value === 'INVITED') return value;
  return 'SUSPENDED';
}

function toMembership(row: MembershipRow): Membership {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    userId: row.user_id,
    role: parseRole(row.role),
    status: parseStatus(row.status),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface MembershipRepo {
  findById(id: string): Promise<Membership | undefined>;
  findForUserAndTenant(userId: string, tenantId: string): Promise<Membership | undefined>;
  listForUser(userId: string): Promise<Membership[]>;
  insert(input: NewMembership): Promise<Membership>;
}

export class SqlMembershipRepo implements MembershipRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<Membership | undefined> {
    const row = await this.db
      .selectFrom('memberships')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toMembership(row) : undefined;
  }

  async findForUserAndTenant(userId: string, tenantId: string): Promise<Membership | undefined> {
    const row = await this.db
      .selectFrom('memberships')
      .selectAll()
      .where('user_id', '=', userId)
      .where('tenant_id', '=', tenantId)
      .executeTakeFirst();
    return row ? toMembership(row) : undefined;
  }

  async listForUser(userId: string): Promise<Membership[]> {
    const rows = await this.db
      .selectFrom('memberships')
      .selectAll()
      .where('user_id', '=', userId)
      .orderBy('created_at')
      .orderBy('id')
      .execute();
    return rows.map(toMembership);
  }

  async insert(input: NewMembership): Promise<Membership> {
    const row = await this.db
      .insertInto('memberships')
      .values({
        tenant_id: input.tenantId,
        user_id: input.userId,
        role: input.role,
        status: input.status,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMembership(row);
  }
}
