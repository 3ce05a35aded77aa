/**
 * src/modules/tenants/tenant.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { TenantController } from './tenant.controller';

export function registerTenantRoutes(app: FastifyInstance, controller: TenantController) {
  app.get('/tenants/directory', controller.searchDirectory.bind(controller));
}
