/**
 * backend/src/shared/audit/audit.writer.ts
 *
 * WHY:
 * - Binds request-level context ONCE so services don't repeat it on every audit call.
 * - Buffers events while the unit of work runs. Nothing reaches the store until the
 *   service hands the buffer to AuditSink after commit: a rolled-back operation
 *   leaves no audit trail.
 *
 * RULES:
 * - No module types imported here (shared must stay module-agnostic).
 * - No business rules.
 * - No AppError.
 * - Context is immutable once created. Only the three AuditContext fields are kept,
 *   so an ActingContext can be passed as is.
 *
 * HOW TO USE:
 *   const audit = new AuditWriter({ tenantId, userId, requestId });
 *   await uow.transaction(async (repos) => { ...; audit.record('Product', id, 'CREATE', {...}); });
 *   sink.dispatch(audit.drain());
 */

import type { AuditAction, AuditChanges, AuditContext, AuditEvent } from './audit.types';

export class AuditWriter {
  private readonly context: Readonly<AuditContext>;
  private buffer: AuditEvent[] = [];

  constructor(context: AuditContext) {
    this.context = Object.freeze({
      tenantId: context.tenantId,
      userId: context.userId,
      requestId: context.requestId,
    });
  }

  record(entityType: string, entityId: string, action: AuditAction, changes: AuditChanges = {}): void {
    this.buffer.push({ ...this.context, entityType, entityId, action, changes });
  }

  /** Returns the buffered events and empties the buffer. */
  drain(): AuditEvent[] {
    const events = this.buffer;
    this.buffer = [];
    return events;
  }
}
