/**
 * src/modules/auth/auth.routes.ts
 *
 * WHY:
 * - Declares Auth module endpoints.
 * - Keeps routing separate from controller logic.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { AuthController } from './auth.controller';

export function registerAuthRoutes(app: FastifyInstance, controller: AuthController) {
  app.post('/auth/signup', controller.signup.bind(controller));
  app.post('/auth/login', controller.login.bind(controller));
  app.post('/auth/logout', controller.logout.bind(controller));
  app.get('/auth/me', controller.me.bind(controller));
  app.post('/auth/switch-tenant', controller.switchTenant.bind(controller));
}
