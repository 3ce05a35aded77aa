/**
 * src/app/build-app.ts
 *
 * WHY:
 * - Assembles the runnable app: config -> deps -> server -> routes -> optional seed.
 * - E2E tests call this with in-memory infra and drive it with app.inject().
 *
 * RULES:
 * - Composition only. No business logic, no request handlers.
 * - The System Global library seed never runs in production, even if enabled.
 */

import type { AppConfig } from './config';
import { buildDeps, type AppDeps, type InfraOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { runDevSeed } from '../shared/db/seed/dev-seed';

async function seedOnStart(config: AppConfig, deps: AppDeps): Promise<void> {
  if (!config.seed.enabled) return;

  const flow = 'seed.dev';
  if (config.nodeEnv === 'production') {
    deps.logger.warn('seed.skipped_in_production', { flow });
    return;
  }

  deps.logger.info('seed.start', { flow });
  await runDevSeed({ uow: deps.uow, logger: deps.logger });
}

export async function buildApp(config: AppConfig, infra: Partial<InfraOverrides> = {}) {
  const deps = await buildDeps(config, infra);
  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });
  await seedOnStart(config, deps);

  return {
    app,
    deps,
    close: async () => {
      await app.close();
      await deps.close();
    },
  };
}
