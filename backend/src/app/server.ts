/**
 * backend/src/app/server.ts
 *
 * WHY:
 * - Builds the Fastify server and registers global plugins/hooks.
 * - Keeps "build app" separate from "start listening" (test-friendly).
 *
 * HOW TO USE:
 * - Called from app/build-app.ts.
 * - Hook order matters: requestContext → authContext → session → request log.
 * - Module routes are registered afterwards by app/routes.ts.
 */

import Fastify from 'fastify';

import type { AppConfig } from './config';
import type { AppDeps } from './di';
import { logger } from '../shared/logger/logger';
import { registerRequestContext } from '../shared/http/request-context';
import { registerAuthContext } from '../shared/http/auth-context';
import { registerErrorHandler } from '../shared/http/error-handler';
import { registerSessionMiddleware } from '../shared/session/session.middleware';

// Certificate uploads travel base64-encoded inside the draft body.
const BODY_LIMIT_BYTES = 15 * 1024 * 1024;

export async function buildServer(opts: { config: AppConfig; deps: AppDeps }) {
  const app = Fastify({
    logger: false, // we use our own Winston logger
    bodyLimit: BODY_LIMIT_BYTES,
  });

  registerRequestContext(app);
  registerAuthContext(app);
  registerSessionMiddleware(app, {
    sessionStore: opts.deps.sessionStore,
    isProduction: opts.config.nodeEnv === 'production',
  });
  registerErrorHandler(app);

  app.addHook('onRequest', async (req) => {
    logger.info('request', {
      method: req.method,
      url: req.url,
      requestId: req.requestContext.requestId,
      tenantId: req.authContext.tenantId,
    });
  });

  return app;
}
