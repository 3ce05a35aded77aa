/**
 * src/shared/audit/inmem-audit-store.ts
 *
 * WHY:
 * - Lets tests assert which audit events an operation produced, without Postgres.
 *
 * RULES:
 * - Implements AuditStore; all() is the test contract, services never call it.
 * - Stores a copy of `changes`, so later mutation by a caller cannot rewrite history.
 */

import type { AuditEvent, AuditStore } from './audit.types';

export class InMemAuditStore implements AuditStore {
  private readonly events: AuditEvent[] = [];

  appendMany(events: readonly AuditEvent[]): Promise<void> {
    for (const event of events) {
      this.events.push({ ...event, changes: structuredClone(event.changes) });
    }
    return Promise.resolve();
  }

  all(): readonly AuditEvent[] {
    return this.events;
  }

  forEntity(entityType: string, entityId: string): AuditEvent[] {
    return this.events.filter((e) => e.entityType === entityType && e.entityId === entityId);
  }
}
