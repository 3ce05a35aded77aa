/**
 * src/modules/tenants/tenant.module.ts
 *
 * WHY:
 * - Encapsulates Tenants module wiring (directory search).
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { AppUnitOfWork } from '../_shared/persistence/repos';

import { TenantService } from './tenant.service';
import { TenantController } from './tenant.controller';
import { registerTenantRoutes } from './tenant.routes';

export type TenantModule = ReturnType<typeof createTenantModule>;

export function createTenantModule(deps: { uow: AppUnitOfWork; logger: Logger }) {
  const tenantService = new TenantService({ uow: deps.uow, logger: deps.logger });
  const controller = new TenantController(tenantService);

  return {
    tenantService,
    registerRoutes(app: FastifyInstance) {
      registerTenantRoutes(app, controller);
    },
  };
}
