/**
 * backend/src/shared/db/seed/run-seed.ts
 *
 * WHY:
 * - Seed the System Global library without starting the HTTP server.
 *
 * HOW TO USE:
 * - npm run db:seed --workspace backend   (after db:migrate)
 */

import { buildConfig } from '../../../app/config';
import { createSqlUnitOfWork } from '../../../modules/_shared/persistence/repos';
import { createDb } from '../db';
import { logger } from '../../logger/logger';
import { runDevSeed } from './dev-seed';

async function main(): Promise<void> {
  const config = buildConfig();
  const db = createDb(config.databaseUrl);

  try {
    await runDevSeed({ uow: createSqlUnitOfWork(db), logger });
  } finally {
    await db.destroy();
  }
}

void main().catch((err: unknown) => {
  logger.error('seed.fatal', { err });
  process.exit(1);
});
