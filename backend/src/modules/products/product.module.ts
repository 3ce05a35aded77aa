/**
 * src/modules/products/product.module.ts
 *
 * WHY:
 * - Encapsulates Products module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';

import { ProductService, type ProductServiceDeps } from './product.service';
import { ProductController } from './product.controller';
import { registerProductRoutes } from './product.routes';

export type ProductModule = ReturnType<typeof createProductModule>;

export function createProductModule(deps: ProductServiceDeps) {
  const productService = new ProductService(deps);
  const controller = new ProductController(productService);

  return {
    productService,
    registerRoutes(app: FastifyInstance) {
      registerProductRoutes(app, controller);
    },
  };
}
