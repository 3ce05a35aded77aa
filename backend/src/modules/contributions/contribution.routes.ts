/**
 * src/modules/contributions/contribution.routes.ts
 *
 * RULES:
 * - No business logic here.
 * - Static segments (incoming, reviews) are registered before /:requestId.
 */

import type { FastifyInstance } from 'fastify';
import type { ContributionController } from './contribution.controller';

export function registerContributionRoutes(
  app: FastifyInstance,
  controller: ContributionController,
) {
  // Brand side
  app.post('/products/:productId/contributions', controller.assign.bind(controller));
  app.get('/contributions/reviews', controller.listPendingReviews.bind(controller));
  app.post('/contributions/:requestId/review', controller.review.bind(controller));
  app.post('/contributions/:requestId/cancel', controller.cancel.bind(controller));

  // Supplier side
  app.get('/contributions/incoming', controller.listIncoming.bind(controller));
  app.post('/contributions/:requestId/accept', controller.accept.bind(controller));
  app.post('/contributions/:requestId/decline', controller.decline.bind(controller));
  app.put('/contributions/:requestId/draft', controller.saveDraft.bind(controller));
  app.post('/contributions/:requestId/submit', controller.submit.bind(controller));

  // Either party
  app.get('/contributions/:requestId', controller.get.bind(controller));
  app.post('/contributions/:requestId/comments', controller.addComment.bind(controller));
}
