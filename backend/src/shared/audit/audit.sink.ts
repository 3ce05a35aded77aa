/**
 * backend/src/shared/audit/audit.sink.ts
 *
 * WHY:
 * - Audit is fire-and-forget: the HTTP response never waits for it and an audit
 *   failure never fails the operation that was audited.
 *
 * RULES:
 * - dispatch() is called only AFTER the unit of work committed.
 * - Failures are logged (`audit.write_failed`) and never rethrown.
 * - idle() resolves once every in-flight write settled (shutdown + tests).
 */

import type { Logger } from '../logger/logger';
import type { AuditEvent, AuditStore } from './audit.types';

export class AuditSink {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly store: AuditStore,
    private readonly logger: Logger,
  ) {}

  dispatch(events: readonly AuditEvent[]): void {
    if (events.length === 0) return;

    const write: Promise<void> = this.store
      .appendMany(events)
      .catch((err: unknown) => {
        this.logger.error({
          msg: 'audit.write_failed',
          flow: 'audit.dispatch',
          requestId: events[0]?.requestId ?? null,
          count: events.length,
          entities: events.map((e) => `${e.entityType}:${e.entityId}:${e.action}`),
          err,
        });
      })
      .finally(() => {
        this.inFlight.delete(write);
      });

    this.inFlight.add(write);
  }

  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }
}
