/**
 * src/modules/connections/connection.module.ts
 *
 * WHY:
 * - Encapsulates Connections module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { ConnectionService, type ConnectionServiceDeps } from './connection.service';
import { ConnectionController } from './connection.controller';
import { registerConnectionRoutes } from './connection.routes';

export type ConnectionModule = ReturnType<typeof createConnectionModule>;

export function createConnectionModule(deps: ConnectionServiceDeps) {
  const connectionService = new ConnectionService(deps);
  const controller = new ConnectionController(connectionService);

  return {
    connectionService,
    registerRoutes(app: FastifyInstance) {
      registerConnectionRoutes(app, controller);
    },
  };
}
