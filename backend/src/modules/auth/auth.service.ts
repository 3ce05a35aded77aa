/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point of the Auth module: signup, login, logout, me, switch-tenant.
 * - Signup and login are deep flows (flows/*); the short operations live here.
 *
 * RULES:
 * - No raw DB access (repos through the unit of work only).
 * - Never store/log raw passwords or tokens.
 * - Sessions are the only place an acting tenant is remembered.
 */

import type { TokenHasher } from '../../shared/security/token-hasher';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { RateLimiter, RateLimitRule } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import type { AuditSink } from '../../shared/audit/audit.sink';
import type { RequiredAuthContext } from '../../shared/http/require-auth-context';
import type { AppUnitOfWork } from '../_shared/persistence/repos';

import { assertSwitchableMembership } from '../memberships/policies/membership-access.policy';
import {
  assertTenantExists,
  assertTenantIsActive,
} from '../tenants/policies/tenant-capability.policy';
import { toPublicUser } from '../users/user.types';

import type { AuthResult, MeResult } from './auth.types';
import { AuthErrors } from './auth.errors';
import { buildAuthResult, toTenantSummary } from './helpers/build-auth-result';
import { executeSignupFlow, type SignupParams } from './flows/signup/execute-signup-flow';
import { executeLoginFlow, type LoginParams } from './flows/login/execute-login-flow';

export type AuthServiceDeps = {
  uow: AppUnitOfWork;
  tokenHasher: TokenHasher;
  passwordHasher: PasswordHasher;
  logger: Logger;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  auditSink: AuditSink;
  loginRateLimit: Omit<RateLimitRule, 'key'>;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  signup(params: SignupParams): Promise<{ result: AuthResult; sessionId: string }> {
    return executeSignupFlow(this.deps, params);
  }

  login(params: LoginParams): Promise<{ result: AuthResult; sessionId: string }> {
    return executeLoginFlow(this.deps, params);
  }

  async logout(params: { sessionId: string | null; requestId: string }): Promise<void> {
    if (!params.sessionId) return;

    await this.deps.sessionStore.destroy(params.sessionId);

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.requestId,
    });
  }

  async me(session: RequiredAuthContext): Promise<MeResult> {
    return this.deps.uow.transaction(async (repos) => {
      const user = await repos.users.findById(session.userId);
      if (!user || !user.isActive) throw AuthErrors.invalidCredentials();

      const activeTenant = await repos.tenants.findById(session.tenantId);
      assertTenantExists(activeTenant, session.tenantId);

      const memberships = (await repos.memberships.listForUser(user.id)).filter(
        (m) => m.status === 'ACTIVE',
      );
      const tenants = await repos.tenants.findManyByIds(memberships.map((m) => m.tenantId));
      const tenantById = new Map(tenants.map((t) => [t.id, t]));

      return {
        user: toPublicUser(user),
        activeTenant: toTenantSummary(activeTenant),
        membership: { id: session.membershipId, role: session.role },
        memberships: memberships.flatMap((m) => {
          const tenant = tenantById.get(m.tenantId);
          return tenant
            ? [{ membershipId: m.id, role: m.role, tenant: toTenantSummary(tenant) }]
            : [];
        }),
      };
    });
  }

  /**
   * Moves the current session to another ACTIVE membership of the same user.
   * The session keeps its id and lifetime.
   */
  async switchTenant(params: {
    session: RequiredAuthContext;
    tenantId: string;
    requestId: string;
  }): Promise<AuthResult> {
    const { session } = params;

    this.deps.logger.info({
      msg: 'auth.switch_tenant.start',
      flow: 'auth.switch_tenant',
      requestId: params.requestId,
      userId: session.userId,
      fromTenantId: session.tenantId,
      toTenantId: params.tenantId,
    });

    const { user, tenant, membership } = await this.deps.uow.transaction(async (repos) => {
      const membership = await repos.memberships.findForUserAndTenant(
        session.userId,
        params.tenantId,
      );
      assertSwitchableMembership(membership, session.userId);

      const tenant = await repos.tenants.findById(membership.tenantId);
      assertTenantExists(tenant, membership.tenantId);
      assertTenantIsActive(tenant);

      const user = await repos.users.findById(session.userId);
      if (!user || !user.isActive) throw AuthErrors.invalidCredentials();

      return { user, tenant, membership };
    });

    const moved = await this.deps.sessionStore.updateSession(session.sessionId, {
      tenantId: tenant.id,
      membershipId: membership.id,
      role: membership.role,
    });
    if (!moved) throw AuthErrors.sessionExpired({ userId: user.id });

    this.deps.logger.info({
      msg: 'auth.switch_tenant.success',
      flow: 'auth.switch_tenant',
      requestId: params.requestId,
      userId: user.id,
      tenantId: tenant.id,
      membershipId: membership.id,
    });

    return buildAuthResult({ user, tenant, membership });
  }
}
