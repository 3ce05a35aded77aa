/**
 * src/modules/references/reference.routes.ts
 *
 * WHY:
 * - The four kinds share one route shape under /references/<segment>.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

type Handler = (req: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

/** Any ReferenceController, whatever its kind. */
export type ReferenceRouteHandlers = {
  list: Handler;
  create: Handler;
  update: Handler;
  delete: Handler;
};

export function registerReferenceRoutes(
  app: FastifyInstance,
  segment: string,
  controller: ReferenceRouteHandlers,
) {
  const base = `/references/${segment}`;

  app.get(base, controller.list.bind(controller));
  app.post(base, controller.create.bind(controller));
  app.patch(`${base}/:id`, controller.update.bind(controller));
  app.delete(`${base}/:id`, controller.delete.bind(controller));
}
