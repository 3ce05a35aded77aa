/**
 * backend/src/shared/db/db.ts
 *
 * WHY:
 * - Central place to create the Kysely DB connection (pg pool).
 * - Table typing comes from tables.ts (kept in step with migrations).
 *
 * HOW TO USE:
 * - DAL code accepts DbExecutor (works for the root db AND a transaction).
 * - Services never touch DbExecutor directly: they go through UnitOfWork.
 */

import pg from 'pg';
import { Kysely, PostgresDialect } from 'kysely';

import type { Database } from './tables';

export type Db = Kysely<Database>;

/**
 * DbExecutor is the only DB "capability" DAL code should accept.
 * Transaction<Database> extends Kysely<Database>, so `trx` fits here too.
 */
export type DbExecutor = Kysely<Database>;

export function createDb(databaseUrl: string): Db {
  const pool = new pg.Pool({
    connectionString: databaseUrl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: 10_000,
  });

  return new Kysely<Database>({
    dialect: new PostgresDialect({ pool }),
  });
}
