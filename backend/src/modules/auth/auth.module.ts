/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';

import { AuthService, type AuthServiceDeps } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(
  deps: AuthServiceDeps & {
    isProduction: boolean;
    sessionTtlSeconds: number;
  },
) {
  const authService = new AuthService({
    uow: deps.uow,
    tokenHasher: deps.tokenHasher,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    rateLimiter: deps.rateLimiter,
    sessionStore: deps.sessionStore,
    auditSink: deps.auditSink,
    loginRateLimit: deps.loginRateLimit,
  });

  const controller = new AuthController(authService, {
    isProduction: deps.isProduction,
    maxAgeSeconds: deps.sessionTtlSeconds,
  });

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
