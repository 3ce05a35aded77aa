import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { InMemCache } from '../../src/shared/cache/inmem-cache';
import { InMemQueue } from '../../src/shared/messaging/inmem-queue';
import { InMemFileStore } from '../../src/shared/storage/inmem-file-store';
import { InMemAuditStore } from '../../src/shared/audit/inmem-audit-store';
import type { AuditStore } from '../../src/shared/audit/audit.types';
import { InMemUnitOfWork } from './inmem-persistence';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build once, inject, close.
 * - Every piece of infrastructure is in-process: no Postgres, no Redis, no disk.
 *
 * RULES:
 * - Seed is OFF by default.
 * - Specs reach into `infra` to assert on stored rows, queued messages and audit events.
 */
export async function buildTestApp(
  overrides: Partial<AppConfig> = {},
  opts: { auditStore?: AuditStore } = {},
) {
  const baseConfig: AppConfig = {
    nodeEnv: 'test',
    port: 0,

    databaseUrl: 'postgres://unused',
    redisUrl: 'redis://unused',

    logLevel: process.env.LOG_LEVEL ?? 'error',
    serviceName: 'passport-hub-backend',

    // bcrypt's minimum; real cost is irrelevant to behaviour
    bcryptCost: 4,

    sessionTtlSeconds: 3600,

    publicAppUrl: 'http://app.test',

    uploads: {
      dir: './unused',
      publicUrl: 'http://files.test/uploads',
    },

    connectionMaxRetries: 3,

    loginRateLimit: {
      limit: 5,
      windowSeconds: 900,
    },

    seed: {
      enabled: false, // IMPORTANT: OFF in tests by default
    },
  };

  const config: AppConfig = {
    ...baseConfig,
    ...overrides,
    seed: {
      ...baseConfig.seed,
      ...(overrides.seed ?? {}),
    },
  };

  const infra = {
    uow: new InMemUnitOfWork(),
    cache: new InMemCache(),
    auditStore: new InMemAuditStore(),
    queue: new InMemQueue(),
    fileStore: new InMemFileStore(),
  };

  const built = await buildApp(config, {
    ...infra,
    auditStore: opts.auditStore ?? infra.auditStore,
  });

  return {
    app: built.app,
    deps: built.deps,
    infra,
    close: built.close,
  };
}
