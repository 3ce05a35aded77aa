/**
 * backend/src/shared/audit/audit.repo.ts
 *
 * WHY:
 * - Append-only audit persistence (Postgres).
 * - Runs in its OWN transaction, after the business transaction committed,
 *   so an audit failure can never roll back the operation it describes.
 *
 * RULES:
 * - DAL-style component: DB concerns only.
 * - No business rules here.
 * - No AppError.
 * - `changes` is serialized here (JSON round trip strips undefined and functions).
 */

import type { Db } from '../db/db';
import type { AuditEvent, AuditStore } from './audit.types';

function toJsonText(input: unknown): string {
  return JSON.stringify(input ?? {});
}

export class AuditRepo implements AuditStore {
  constructor(private readonly db: Db) {}

  async appendMany(events: readonly AuditEvent[]): Promise<void> {
    if (events.length === 0) return;

    await this.db.transaction().execute(async (trx) => {
      await trx
        .insertInto('audit_events')
        .values(
          events.map((event) => ({
            tenant_id: event.tenantId,
            user_id: event.userId,
            request_id: event.requestId,
            entity_type: event.entityType,
            entity_id: event.entityId,
            action: event.action,
            changes: toJsonText(event.changes),
            // created_at is Generated in DB
          })),
        )
        .execute();
    });
  }
}
