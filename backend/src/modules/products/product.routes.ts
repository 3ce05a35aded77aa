/**
 * src/modules/products/product.routes.ts
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance } from 'fastify';
import type { ProductController } from './product.controller';

export function registerProductRoutes(app: FastifyInstance, controller: ProductController) {
  app.post('/products', controller.create.bind(controller));
  app.get('/products', controller.list.bind(controller));
  app.get('/products/:productId', controller.get.bind(controller));
  app.patch('/products/:productId', controller.update.bind(controller));

  app.post('/products/:productId/versions', controller.createNextVersion.bind(controller));
  app.patch(
    '/products/:productId/versions/:versionId',
    controller.updateVersion.bind(controller),
  );

  app.post('/products/:productId/media', controller.addMedia.bind(controller));
  app.post('/products/:productId/media/:mediaId/main', controller.setMainMedia.bind(controller));
  app.delete('/products/:productId/media/:mediaId', controller.deleteMedia.bind(controller));
}
