/**
 * backend/src/modules/auth/flows/signup/execute-signup-flow.ts
 *
 * WHY:
 * - Public signup creates a whole organization in one unit of work:
 *   user + tenant (unique slug) + ACTIVE ADMIN membership.
 * - Email invitations that were waiting for this address are linked to the new tenant.
 *
 * RULES:
 * - No HTTP concerns here.
 * - Password is hashed BEFORE the transaction (bcrypt is slow; keep tx short).
 * - Audit events are dispatched only after commit.
 */

import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { SessionStore } from '../../../../shared/session/session.store';
import type { AuditSink } from '../../../../shared/audit/audit.sink';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { AppUnitOfWork } from '../../../_shared/persistence/repos';

import { AuthErrors } from '../../auth.errors';
import type { AuthResult } from '../../auth.types';
import type { SignupInput } from '../../auth.schemas';
import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditSignup } from '../../auth.audit';
import { createAuthSession } from '../../helpers/create-auth-session';
import { buildAuthResult } from '../../helpers/build-auth-result';
import { emailDomain } from '../../helpers/email-domain';

import { TenantErrors } from '../../../tenants/tenant.errors';
import { findFreeSlug, slugify } from '../../../tenants/helpers/slug';
import { linkPendingInvitations } from '../../../connections/helpers/link-pending-invitations';

export type SignupParams = SignupInput & {
  ip: string;
  requestId: string;
};

export async function executeSignupFlow(
  deps: {
    uow: AppUnitOfWork;
    tokenHasher: TokenHasher;
    passwordHasher: PasswordHasher;
    logger: Logger;
    rateLimiter: RateLimiter;
    sessionStore: SessionStore;
    auditSink: AuditSink;
  },
  params: SignupParams,
): Promise<{ result: AuthResult; sessionId: string }> {
  const email = params.email.toLowerCase();
  const emailKey = deps.tokenHasher.hash(email);
  const now = new Date();

  deps.logger.info({
    msg: 'auth.signup.start',
    flow: 'auth.signup',
    requestId: params.requestId,
    emailDomain: emailDomain(email),
    emailKey,
    accountType: params.accountType,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `signup:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.signup.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `signup:ip:${params.ip}`,
    ...AUTH_RATE_LIMITS.signup.perIp,
  });

  const passwordHash = await deps.passwordHasher.hash(params.password);
  const invitationTokenHash = params.invitationToken
    ? deps.tokenHasher.hash(params.invitationToken)
    : null;

  const created = await deps.uow.transaction(async (repos) => {
    if (await repos.users.findByEmail(email)) {
      throw AuthErrors.emailTaken();
    }

    if (await repos.tenants.findByName(params.companyName)) {
      throw TenantErrors.nameTaken();
    }

    const slug = await findFreeSlug(slugify(params.companyName), (candidate) =>
      repos.tenants.slugExists(candidate),
    );
    if (!slug) throw TenantErrors.slugExhausted();

    const user = await repos.users.insert({
      email,
      passwordHash,
      firstName: params.firstName,
      lastName: params.lastName,
    });

    const tenant = await repos.tenants.insert({
      name: params.companyName,
      slug,
      type: params.accountType,
      locationCountry: params.locationCountry,
    });

    const membership = await repos.memberships.insert({
      tenantId: tenant.id,
      userId: user.id,
      role: 'ADMIN',
      status: 'ACTIVE',
    });

    const linkedConnections = await linkPendingInvitations(repos, {
      email,
      tenantId: tenant.id,
      invitationTokenHash,
    });

    return { user, tenant, membership, linkedConnections };
  });

  const audit = new AuditWriter({
    tenantId: created.tenant.id,
    userId: created.user.id,
    requestId: params.requestId,
  });
  auditSignup(audit, created);
  deps.auditSink.dispatch(audit.drain());

  const sessionId = await createAuthSession({
    sessionStore: deps.sessionStore,
    membership: created.membership,
    now,
  });

  deps.logger.info({
    msg: 'auth.signup.success',
    flow: 'auth.signup',
    requestId: params.requestId,
    tenantId: created.tenant.id,
    userId: created.user.id,
    membershipId: created.membership.id,
    linkedConnections: created.linkedConnections.length,
  });

  return {
    sessionId,
    result: buildAuthResult(created),
  };
}
