/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, redis) and shares them safely.
 * - Keeps modules testable: tests hand in-memory infrastructure through `infra`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (e.g. disable rate limits in test) belong HERE,
 *   not inside the classes themselves (DIP).
 * - Only infrastructure not supplied in `infra` is created (and later closed) here.
 */

import type { AppConfig } from './config';
import { createDb, type Db } from '../shared/db/db';

import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import { RateLimiter } from '../shared/security/rate-limit';
import type { TokenHasher } from '../shared/security/token-hasher';
import { Sha256TokenHasher } from '../shared/security/sha256-token-hasher';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { AuditRepo } from '../shared/audit/audit.repo';
import { AuditSink } from '../shared/audit/audit.sink';
import type { AuditStore } from '../shared/audit/audit.types';
import { SessionStore } from '../shared/session/session.store';

import { InMemQueue } from '../shared/messaging/inmem-queue';
import type { Queue } from '../shared/messaging/queue';

import type { FileStore } from '../shared/storage/file-store';
import { LocalFileStore } from '../shared/storage/local-file-store';

import { createSqlUnitOfWork, type AppUnitOfWork } from '../modules/_shared/persistence/repos';

import { createTenantModule, type TenantModule } from '../modules/tenants/tenant.module';
import { createAuthModule, type AuthModule } from '../modules/auth/auth.module';
import {
  createReferenceModule,
  type ReferenceModule,
} from '../modules/references/reference.module';
import {
  createConnectionModule,
  type ConnectionModule,
} from '../modules/connections/connection.module';
import { createProductModule, type ProductModule } from '../modules/products/product.module';
import {
  createContributionModule,
  type ContributionModule,
} from '../modules/contributions/contribution.module';

/** Infrastructure a caller (tests) may provide instead of the real clients. */
export type InfraOverrides = {
  uow: AppUnitOfWork;
  cache: Cache;
  auditStore: AuditStore;
  queue: Queue;
  fileStore: FileStore;
};

export type AppDeps = {
  db: Db | null;
  uow: AppUnitOfWork;
  cache: Cache;

  logger: Logger;

  rateLimiter: RateLimiter;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;

  auditSink: AuditSink;
  sessionStore: SessionStore;

  // messaging + storage
  queue: Queue;
  fileStore: FileStore;

  // modules
  tenants: TenantModule;
  auth: AuthModule;
  references: ReferenceModule;
  connections: ConnectionModule;
  products: ProductModule;
  contributions: ContributionModule;

  // lifecycle
  close: () => Promise<void>;
};

export async function buildDeps(
  config: AppConfig,
  infra: Partial<InfraOverrides> = {},
): Promise<AppDeps> {
  // Postgres is only opened when something still needs it.
  const needsDb = !infra.uow || !infra.auditStore;
  const db = needsDb ? createDb(config.databaseUrl) : null;

  let uow: AppUnitOfWork;
  let auditStore: AuditStore;
  if (db) {
    uow = infra.uow ?? createSqlUnitOfWork(db);
    auditStore = infra.auditStore ?? new AuditRepo(db);
  } else if (infra.uow && infra.auditStore) {
    uow = infra.uow;
    auditStore = infra.auditStore;
  } else {
    throw new Error('Persistence misconfigured: no database and no in-memory gateway');
  }

  // Redis is mandatory outside tests
  const redis = infra.cache ? null : await RedisCache.connect(config.redisUrl);
  const cache: Cache | null = infra.cache ?? redis;
  if (!cache) throw new Error('Cache misconfigured: no redis and no in-memory cache');

  const tokenHasher: TokenHasher = new Sha256TokenHasher();
  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({ cost: config.bcryptCost });

  // Composition root decides when rate limiting is disabled.
  // The RateLimiter class itself has no knowledge of environments.
  const rateLimiter = new RateLimiter(cache, {
    prefix: 'rl',
    disabled: config.nodeEnv === 'test',
  });

  const auditSink = new AuditSink(auditStore, logger);
  const sessionStore = new SessionStore(cache, config.sessionTtlSeconds);

  // Phase 1: in-memory queue (swap for an email/SQS adapter here in production)
  const queue: Queue = infra.queue ?? new InMemQueue();

  const fileStore: FileStore =
    infra.fileStore ??
    new LocalFileStore({ rootDir: config.uploads.dir, publicBaseUrl: config.uploads.publicUrl });

  // modules (no HTTP / no business logic here)
  const tenants = createTenantModule({ uow, logger });

  const auth = createAuthModule({
    uow,
    tokenHasher,
    passwordHasher,
    logger,
    rateLimiter,
    sessionStore,
    auditSink,
    loginRateLimit: config.loginRateLimit,
    isProduction: config.nodeEnv === 'production',
    sessionTtlSeconds: config.sessionTtlSeconds,
  });

  const references = createReferenceModule({ uow, logger, auditSink });

  const connections = createConnectionModule({
    uow,
    logger,
    auditSink,
    queue,
    tokenHasher,
    publicAppUrl: config.publicAppUrl,
    maxRetries: config.connectionMaxRetries,
  });

  const products = createProductModule({ uow, logger, auditSink });

  const contributions = createContributionModule({
    uow,
    logger,
    auditSink,
    queue,
    fileStore,
  });

  return {
    db,
    uow,
    cache,
    logger,
    rateLimiter,
    tokenHasher,
    passwordHasher,
    auditSink,
    sessionStore,
    queue,
    fileStore,
    tenants,
    auth,
    references,
    connections,
    products,
    contributions,
    close: async () => {
      await auditSink.idle();
      if (redis) await redis.close();
      if (db) await db.destroy();
    },
  };
}
