/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (entity change trail stored in DB).
 * - Keeps audit writes consistent across all modules.
 * - AuditContext groups the request-level fields that repeat on every event.
 *
 * RULES:
 * - Keep types explicit and safe.
 * - `changes` is a plain object (the store serializes it to JSON).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type AuditAction = 'CREATE' | 'UPDATE' | 'DELETE';

export type AuditChanges = Record<string, unknown>;

/**
 * Request-level context that is identical across every audit event
 * within a single request.
 */
export type AuditContext = {
  tenantId: string | null;
  userId: string | null;
  requestId: string | null;
};

export type AuditEvent = AuditContext & {
  entityType: string;
  entityId: string;
  action: AuditAction;
  changes: AuditChanges;
};

/**
 * Where committed audit events end up.
 * appendMany writes all events of one operation together (one transaction in SQL).
 */
export interface AuditStore {
  appendMany(events: readonly AuditEvent[]): Promise<void>;
}
