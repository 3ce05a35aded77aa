/**
 * backend/src/app/routes.ts
 *
 * WHY:
 * - Central place to register all routes:
 *   - core routes (/health)
 *   - module routes (auth, tenants, references, connections, products, contributions)
 *
 * RULES:
 * - No business logic here.
 * - Only wiring: each module owns its own paths.
 */

import type { FastifyInstance } from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';

export function registerRoutes(app: FastifyInstance, opts: { config: AppConfig; deps: AppDeps }) {
  // Core health endpoint (E2E smoke + platform checks)
  app.get('/health', (req) => {
    return {
      ok: true,
      env: opts.config.nodeEnv,
      service: opts.config.serviceName,
      requestId: req.requestContext.requestId,
    };
  });

  // Module routes
  opts.deps.auth.registerRoutes(app);
  opts.deps.tenants.registerRoutes(app);
  opts.deps.references.registerRoutes(app);
  opts.deps.connections.registerRoutes(app);
  opts.deps.products.registerRoutes(app);
  opts.deps.contributions.registerRoutes(app);
}
