/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP → AuthService for all auth endpoints.
 * - Sets the session cookie on signup/login and clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-auth-context';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { loginSchema, signupSchema, switchTenantSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly cookie: { isProduction: boolean; maxAgeSeconds: number },
  ) {}

  async signup(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signupSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { result, sessionId } = await this.authService.signup({
      ...parsed.data,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, sessionId, this.cookie);
    return reply.status(201).send(result);
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { result, sessionId } = await this.authService.login({
      email: parsed.data.email,
      password: parsed.data.password,
      tenantId: parsed.data.tenantId,
      ip: req.ip,
      requestId: req.requestContext.requestId,
    });

    setSessionCookie(reply, sessionId, this.cookie);
    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      sessionId: req.authContext.sessionId,
      requestId: req.requestContext.requestId,
    });

    clearSessionCookie(reply, this.cookie.isProduction);
    return reply.status(200).send({ status: 'LOGGED_OUT' });
  }

  async me(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);
    const result = await this.authService.me(session);
    return reply.status(200).send(result);
  }

  async switchTenant(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req);

    const parsed = switchTenantSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.switchTenant({
      session,
      tenantId: parsed.data.tenantId,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send(result);
  }
}
