/**
 * src/modules/connections/connection.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { ConnectionController } from './connection.controller';

export function registerConnectionRoutes(app: FastifyInstance, controller: ConnectionController) {
  // Brand side: address book
  app.post('/connections', controller.create.bind(controller));
  app.get('/connections/profiles', controller.listProfiles.bind(controller));
  app.get('/connections/profiles/:profileId', controller.getProfile.bind(controller));
  app.patch('/connections/profiles/:profileId', controller.updateProfile.bind(controller));
  app.post('/connections/profiles/:profileId/reinvite', controller.reinvite.bind(controller));
  app.delete('/connections/profiles/:profileId', controller.disconnect.bind(controller));

  // Supplier side
  app.get('/connections/incoming', controller.listIncoming.bind(controller));
  app.post('/connections/:connectionId/respond', controller.respond.bind(controller));

  // Public
  app.get('/invitations/validate', controller.validateToken.bind(controller));
}
