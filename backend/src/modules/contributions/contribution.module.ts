/**
 * src/modules/contributions/contribution.module.ts
 *
 * WHY:
 * - Encapsulates Contributions module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { ContributionService, type ContributionServiceDeps } from './contribution.service';
import { ContributionController } from './contribution.controller';
import { registerContributionRoutes } from './contribution.routes';

export type ContributionModule = ReturnType<typeof createContributionModule>;

export function createContributionModule(deps: ContributionServiceDeps) {
  const contributionService = new ContributionService(deps);
  const controller = new ContributionController(contributionService);

  return {
    contributionService,
    registerRoutes(app: FastifyInstance) {
      registerContributionRoutes(app, controller);
    },
  };
}
