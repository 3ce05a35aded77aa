/**
 * backend/src/modules/connections/dal/connection.repo.ts
 *
 * WHY:
 * - Persistence port for tenant_connections + its Kysely implementation.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - No policies: status rules live in connection-state.policy.ts.
 * - Every update bumps updated_at.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { TenantConnectionsTable } from '../../../shared/db/tables';
import { toConnection } from '../connection.queries';
import type { ConnectionPatch, NewConnection, TenantConnection } from '../connection.types';

export type ConnectionTarget = { tenantId: string } | { email: string };

export interface ConnectionRepo {
  findById(id: string): Promise<TenantConnection | undefined>;
  findByTokenHash(tokenHash: string): Promise<TenantConnection | undefined>;
  /** Any connection of the requester to the target that is not DISCONNECTED. */
  findOpenToTarget(
    requesterTenantId: string,
    target: ConnectionTarget,
  ): Promise<TenantConnection | undefined>;
  listPendingForTarget(targetTenantId: string): Promise<TenantConnection[]>;
  /** PENDING email invitations not yet linked to a tenant. */
  listUnlinkedPendingByEmail(email: string): Promise<TenantConnection[]>;
  insert(input: NewConnection): Promise<TenantConnection>;
  update(id: string, patch: ConnectionPatch): Promise<TenantConnection>;
  delete(id: string): Promise<void>;
}

function toConnectionUpdate(patch: ConnectionPatch): Updateable<TenantConnectionsTable> {
  const values: Updateable<TenantConnectionsTable> = { updated_at: new Date() };

  if (patch.targetTenantId !== undefined) values.target_tenant_id = patch.targetTenantId;
  if (patch.invitationEmail !== undefined) values.invitation_email = patch.invitationEmail;
  if (patch.status !== undefined) values.status = patch.status;
  if (patch.invitationTokenHash !== undefined) {
    values.invitation_token_hash = patch.invitationTokenHash;
  }
  if (patch.requestNote !== undefined) values.request_note = patch.requestNote;
  if (patch.retryCount !== undefined) values.retry_count = patch.retryCount;
  if (patch.lastInvitedAt !== undefined) values.last_invited_at = patch.lastInvitedAt;

  return values;
}

export class SqlConnectionRepo implements ConnectionRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<TenantConnection | undefined> {
    const row = await this.db
      .selectFrom('tenant_connections')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toConnection(row) : undefined;
  }

  async findByTokenHash(tokenHash: string): Promise<TenantConnection | undefined> {
    const row = await this.db
      .selectFrom('tenant_connections')
      .selectAll()
      .where('invitation_token_hash', '=', tokenHash)
      .executeTakeFirst();
    return row ? toConnection(row) : undefined;
  }

  async findOpenToTarget(
    requesterTenantId: string,
    target: ConnectionTarget,
  ): Promise<TenantConnection | undefined> {
    let query = this.db
      .selectFrom('tenant_connections')
      .selectAll()
      .where('requester_tenant_id', '=', requesterTenantId)
      .where('status', '!=', 'DISCONNECTED');

    query =
      'tenantId' in target
        ? query.where('target_tenant_id', '=', target.tenantId)
        : query.where('invitation_email', '=', target.email);

    const row = await query.executeTakeFirst();
    return row ? toConnection(row) : undefined;
  }

  async listPendingForTarget(targetTenantId: string): Promise<TenantConnection[]> {
    const rows = await this.db
      .selectFrom('tenant_connections')
      .selectAll()
      .where('target_tenant_id', '=', targetTenantId)
      .where('status', '=', 'PENDING')
      .orderBy('last_invited_at', 'desc')
      .execute();
    return rows.map(toConnection);
  }

  async listUnlinkedPendingByEmail(email: string): Promise<TenantConnection[]> {
    const rows = await this.db
      .selectFrom('tenant_connections')
      .selectAll()
      .where('invitation_email', '=', email)
      .where('target_tenant_id', 'is', null)
      .where('status', '=', 'PENDING')
      .execute();
    return rows.map(toConnection);
  }

  async insert(input: NewConnection): Promise<TenantConnection> {
    const row = await this.db
      .insertInto('tenant_connections')
      .values({
        requester_tenant_id: input.requesterTenantId,
        target_tenant_id: input.targetTenantId,
        invitation_email: input.invitationEmail,
        status: 'PENDING',
        invitation_token_hash: input.invitationTokenHash,
        request_note: input.requestNote,
        last_invited_at: input.lastInvitedAt,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toConnection(row);
  }

  async update(id: string, patch: ConnectionPatch): Promise<TenantConnection> {
    const row = await this.db
      .updateTable('tenant_connections')
      .set(toConnectionUpdate(patch))
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toConnection(row);
  }

  async delete(id: string): Promise<void> {
    await this.db.deleteFrom('tenant_connections').where('id', '=', id).execute();
  }
}
