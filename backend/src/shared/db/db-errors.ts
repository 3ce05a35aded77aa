/**
 * src/shared/db/db-errors.ts
 *
 * WHY:
 * - Services check uniqueness before writing, but two concurrent writes can both pass the
 *   check. The database constraint decides; this recognizes its verdict.
 */

import pg from 'pg';

// https://www.postgresql.org/docs/current/errcodes-appendix.html
const UNIQUE_VIOLATION = '23505';

export type UniqueViolation = InstanceType<typeof pg.DatabaseError> & { code: '23505' };

export function isUniqueViolation(err: unknown): err is UniqueViolation {
  return err instanceof pg.DatabaseError && err.code === UNIQUE_VIOLATION;
}
