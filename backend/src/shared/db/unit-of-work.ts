/**
 * backend/src/shared/db/unit-of-work.ts
 *
 * WHY:
 * - Every workflow operation (review, saveDraft, reinvite, ...) must commit all of its
 *   rows atomically or none of them.
 * - Services ask for a unit of work and receive repositories bound to ONE transaction;
 *   they never see Kysely or a connection.
 *
 * RULES:
 * - A thrown error inside `work` rolls everything back and is rethrown unchanged.
 * - Nothing that must survive a rollback (audit, notifications) happens inside `work`.
 * - Generic over the repo bundle: shared/ must not import module types.
 */

import type { Db, DbExecutor } from './db';

export interface UnitOfWork<TRepos> {
  transaction<T>(work: (repos: TRepos) => Promise<T>): Promise<T>;
}

export class KyselyUnitOfWork<TRepos> implements UnitOfWork<TRepos> {
  constructor(
    private readonly db: Db,
    private readonly bindRepos: (executor: DbExecutor) => TRepos,
  ) {}

  transaction<T>(work: (repos: TRepos) => Promise<T>): Promise<T> {
    return this.db.transaction().execute((trx) => work(this.bindRepos(trx)));
  }
}
