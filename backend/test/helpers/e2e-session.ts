import { randomUUID } from 'node:crypto';
import type { FastifyInstance } from 'fastify';

/**
 * WHY:
 * - Most E2E specs need one or more signed-in organizations.
 * - Going through POST /auth/signup keeps the specs on the public surface only.
 */

export const TEST_PASSWORD = 'Sup3rSecret!';

export type AccountType = 'BRAND' | 'SUPPLIER' | 'HYBRID';

export type TestSession = {
  cookie: string;
  email: string;
  userId: string;
  tenantId: string;
  slug: string;
  membershipId: string;
};

type SignupResponseBody = {
  status: 'AUTHENTICATED';
  user: { id: string; email: string; firstName: string; lastName: string };
  tenant: { id: string; name: string; slug: string; type: AccountType };
  membership: { id: string; role: string };
};

export type ErrorResponseBody = {
  error: { code: string; message: string };
};

export function readJson<T>(res: { json: () => unknown }): T {
  return res.json() as T;
}

/** `sid=<id>` pair of the Set-Cookie header, ready to send back as Cookie. */
export function sessionCookieFrom(res: { headers: Record<string, unknown> }): string {
  const header = res.headers['set-cookie'];
  const raw = Array.isArray(header) ? header[0] : header;
  if (typeof raw !== 'string') throw new Error('response has no Set-Cookie header');

  const pair = raw.split(';')[0] ?? '';
  if (!pair.startsWith('sid=')) throw new Error(`unexpected cookie: ${raw}`);
  return pair;
}

export function uniqueEmail(prefix = 'user'): string {
  return `${prefix}-${randomUUID()}@example.test`;
}

export async function signup(
  app: FastifyInstance,
  opts: {
    accountType: AccountType;
    companyName?: string;
    email?: string;
    invitationToken?: string;
  },
): Promise<TestSession> {
  const email = opts.email ?? uniqueEmail(opts.accountType.toLowerCase());

  const res = await app.inject({
    method: 'POST',
    url: '/auth/signup',
    payload: {
      firstName: 'Test',
      lastName: 'User',
      email,
      password: TEST_PASSWORD,
      companyName: opts.companyName ?? `${opts.accountType} ${randomUUID().slice(0, 8)}`,
      locationCountry: 'DE',
      accountType: opts.accountType,
      invitationToken: opts.invitationToken,
    },
  });

  if (res.statusCode !== 201) {
    throw new Error(`signup failed (${res.statusCode}): ${res.body}`);
  }

  const body = readJson<SignupResponseBody>(res);
  return {
    cookie: sessionCookieFrom(res),
    email,
    userId: body.user.id,
    tenantId: body.tenant.id,
    slug: body.tenant.slug,
    membershipId: body.membership.id,
  };
}

/** Invitation token carried by an invitation link. */
export function tokenFromLink(link: string): string {
  const token = new URL(link).searchParams.get('token');
  if (!token) throw new Error(`no token in ${link}`);
  return token;
}
