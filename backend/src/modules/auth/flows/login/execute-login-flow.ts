/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating the credential + membership checks.
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - Rate limit before any DB work.
 * - Unknown email, wrong password and inactive user share ONE error.
 * - Every failure is logged with a reason code (never the password, never the email).
 */

import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter, RateLimitRule } from '../../../../shared/security/rate-limit';
import type { SessionStore } from '../../../../shared/session/session.store';
import type { AppUnitOfWork } from '../../../_shared/persistence/repos';

import { AuthErrors } from '../../auth.errors';
import type { AuthResult } from '../../auth.types';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { createAuthSession } from '../../helpers/create-auth-session';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain } from '../../helpers/email-domain';
import {
  assertLoginMembershipAllowed,
  getLoginMembershipGatingFailure,
  selectLoginMembership,
} from '../../policies/login-membership-gating.policy';

import {
  assertTenantExists,
  assertTenantIsActive,
} from '../../../tenants/policies/tenant-capability.policy';

export type LoginParams = {
  email: string;
  password: string;
  tenantId?: string;
  ip: string;
  requestId: string;
};

type LoginFailureContext = {
  userId?: string;
  membershipId?: string;
  reason: string;
};

export async function executeLoginFlow(
  deps: {
    uow: AppUnitOfWork;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    sessionStore: SessionStore;
    loginRateLimit: Omit<RateLimitRule, 'key'>;
  },
  params: LoginParams,
): Promise<{ result: AuthResult; sessionId: string }> {
  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);
  const now = new Date();

  deps.logger.info({
    msg: 'auth.login.start',
    flow: 'auth.login',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `login:email:${emailKey}`,
    ...deps.loginRateLimit,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  // Filled in as each check fails; read after the unit of work rolled back.
  const failure: { ctx: LoginFailureContext | null } = { ctx: null };

  try {
    const { user, membership, tenant } = await deps.uow.transaction(async (repos) => {
      const user = await repos.users.findByEmail(email);
      if (!user) {
        failure.ctx = { reason: 'user_not_found' };
        throw AuthErrors.invalidCredentials();
      }

      const passwordValid = await deps.passwordHasher.verify(params.password, user.passwordHash);
      if (!passwordValid) {
        failure.ctx = { userId: user.id, reason: 'wrong_password' };
        throw AuthErrors.invalidCredentials();
      }

      if (!user.isActive) {
        failure.ctx = { userId: user.id, reason: 'user_inactive' };
        throw AuthErrors.invalidCredentials();
      }

      const memberships = await repos.memberships.listForUser(user.id);
      const membership = selectLoginMembership(memberships, params.tenantId);

      const gatingFailure = getLoginMembershipGatingFailure(membership);
      if (gatingFailure) {
        failure.ctx = {
          userId: user.id,
          membershipId: membership?.id,
          reason: gatingFailure.reason,
        };
        throw gatingFailure.error;
      }
      assertLoginMembershipAllowed(membership);

      const tenant = await repos.tenants.findById(membership.tenantId);
      assertTenantExists(tenant, membership.tenantId);
      assertTenantIsActive(tenant);

      return { user, membership, tenant };
    });

    const sessionId = await createAuthSession({
      sessionStore: deps.sessionStore,
      membership,
      now,
    });

    deps.logger.info({
      msg: 'auth.login.success',
      flow: 'auth.login',
      requestId: params.requestId,
      tenantId: tenant.id,
      userId: user.id,
      membershipId: membership.id,
      role: membership.role,
    });

    return { sessionId, result: buildAuthResult({ user, tenant, membership }) };
  } catch (err) {
    if (failure.ctx) {
      deps.logger.warn({
        msg: 'auth.login.failed',
        flow: 'auth.login',
        requestId: params.requestId,
        emailKey,
        userId: failure.ctx.userId ?? null,
        membershipId: failure.ctx.membershipId ?? null,
        reason: failure.ctx.reason,
      });
    }

    throw err;
  }
}
