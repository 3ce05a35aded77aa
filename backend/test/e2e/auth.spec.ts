import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { buildTestApp } from '../helpers/build-test-app';
import {
  TEST_PASSWORD,
  readJson,
  sessionCookieFrom,
  signup,
  uniqueEmail,
  type ErrorResponseBody,
} from '../helpers/e2e-session';

/**
 * E2E tests for the session endpoints: signup, login, logout, me, switch-tenant.
 */

type AuthenticatedResponseBody = {
  status: 'AUTHENTICATED';
  user: { id: string; email: string; firstName: string; lastName: string };
  tenant: { id: string; name: string; slug: string; type: string };
  membership: { id: string; role: string };
};

type MeResponseBody = {
  user: { id: string; email: string };
  activeTenant: { id: string; slug: string; type: string };
  membership: { id: string; role: string };
  memberships: { membershipId: string; tenant: { id: string } }[];
};

describe('auth', () => {
  let ctx: Awaited<ReturnType<typeof buildTestApp>>;

  beforeEach(async () => {
    ctx = await buildTestApp();
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe('POST /auth/signup', () => {
    it('creates user, organization and ADMIN membership and starts a session', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/signup',
        payload: {
          firstName: 'Ada',
          lastName: 'Brand',
          email: 'Ada@Example.test',
          password: TEST_PASSWORD,
          companyName: 'Acme Clothing Co.',
          locationCountry: 'de',
          accountType: 'BRAND',
        },
      });

      expect(res.statusCode).toBe(201);
      const body = readJson<AuthenticatedResponseBody>(res);
      expect(body.status).toBe('AUTHENTICATED');
      expect(body.user.email).toBe('ada@example.test');
      expect(body.tenant).toMatchObject({
        name: 'Acme Clothing Co.',
        slug: 'acme-clothing-co',
        type: 'BRAND',
      });
      expect(body.membership.role).toBe('ADMIN');

      const setCookie = res.headers['set-cookie'];
      expect(String(setCookie)).toContain('HttpOnly');
      expect(String(setCookie)).toContain('SameSite=Strict');
      expect(String(setCookie)).toContain('Max-Age=3600');

      const tenant = ctx.infra.uow.db.tables.tenants.find((t) => t.id === body.tenant.id);
      expect(tenant?.locationCountry).toBe('DE');
    });

    it('rejects an email that is already registered', async () => {
      const first = await signup(ctx.app, { accountType: 'BRAND' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/signup',
        payload: {
          firstName: 'Bob',
          lastName: 'Again',
          email: first.email.toUpperCase(),
          password: TEST_PASSWORD,
          companyName: 'Another Company',
          locationCountry: 'FR',
          accountType: 'SUPPLIER',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'An account with this email already exists. Please sign in.',
      );
    });

    it('rejects a company name that is already taken', async () => {
      await signup(ctx.app, { accountType: 'BRAND', companyName: 'North Yarns' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/signup',
        payload: {
          firstName: 'Cat',
          lastName: 'Copy',
          email: uniqueEmail(),
          password: TEST_PASSWORD,
          companyName: 'North Yarns',
          locationCountry: 'FR',
          accountType: 'SUPPLIER',
        },
      });

      expect(res.statusCode).toBe(409);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'An organization with this company name already exists.',
      );
    });

    it('gives colliding slugs a numeric suffix', async () => {
      const a = await signup(ctx.app, { accountType: 'BRAND', companyName: 'Blue Mill' });
      const b = await signup(ctx.app, { accountType: 'BRAND', companyName: 'Blue-Mill' });

      expect(a.slug).toBe('blue-mill');
      expect(b.slug).toBe('blue-mill-1');
    });

    it('returns 400 for an invalid body', async () => {
      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/signup',
        payload: { email: 'not-an-email', password: 'short' },
      });

      expect(res.statusCode).toBe(400);
      expect(readJson<ErrorResponseBody>(res).error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('POST /auth/login', () => {
    it('logs in with the right password, case-insensitive email', async () => {
      const session = await signup(ctx.app, { accountType: 'SUPPLIER' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: session.email.toUpperCase(), password: TEST_PASSWORD },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<AuthenticatedResponseBody>(res);
      expect(body.user.id).toBe(session.userId);
      expect(body.tenant.id).toBe(session.tenantId);

      const me = await ctx.app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { cookie: sessionCookieFrom(res) },
      });
      expect(me.statusCode).toBe(200);
    });

    it('returns the same 401 for a wrong password and an unknown email', async () => {
      const session = await signup(ctx.app, { accountType: 'BRAND' });

      const wrongPassword = await ctx.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: session.email, password: 'not-the-password' },
      });
      const unknownEmail = await ctx.app.inject({
        method: 'POST',
        url: '/auth/login',
        payload: { email: uniqueEmail('ghost'), password: TEST_PASSWORD },
      });

      for (const res of [wrongPassword, unknownEmail]) {
        expect(res.statusCode).toBe(401);
        expect(readJson<ErrorResponseBody>(res).error.message).toBe('Invalid email or password.');
      }
    });
  });

  describe('GET /auth/me', () => {
    it('requires a session', async () => {
      const res = await ctx.app.inject({ method: 'GET', url: '/auth/me' });
      expect(res.statusCode).toBe(401);
    });

    it('describes the signed-in user and organization', async () => {
      const session = await signup(ctx.app, { accountType: 'HYBRID' });

      const res = await ctx.app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { cookie: session.cookie },
      });

      expect(res.statusCode).toBe(200);
      const body = readJson<MeResponseBody>(res);
      expect(body.user.id).toBe(session.userId);
      expect(body.activeTenant).toMatchObject({ id: session.tenantId, type: 'HYBRID' });
      expect(body.membership).toEqual({ id: session.membershipId, role: 'ADMIN' });
      expect(body.memberships).toHaveLength(1);
      expect(body.memberships[0]?.tenant.id).toBe(session.tenantId);
    });
  });

  describe('POST /auth/logout', () => {
    it('destroys the session and clears the cookie', async () => {
      const session = await signup(ctx.app, { accountType: 'BRAND' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/logout',
        headers: { cookie: session.cookie },
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({ status: 'LOGGED_OUT' });
      expect(String(res.headers['set-cookie'])).toContain('Max-Age=0');

      const me = await ctx.app.inject({
        method: 'GET',
        url: '/auth/me',
        headers: { cookie: session.cookie },
      });
      expect(me.statusCode).toBe(401);
    });

    it('clears a cookie whose session no longer exists', async () => {
      const res = await ctx.app.inject({
        method: 'GET',
        url: '/health',
        headers: { cookie: 'sid=00000000-0000-4000-8000-000000000000' },
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['set-cookie']).toBe('sid=; Path=/; HttpOnly; SameSite=Strict; Max-Age=0');
    });
  });

  describe('POST /auth/switch-tenant', () => {
    it('stays in the current organization when switching to it', async () => {
      const session = await signup(ctx.app, { accountType: 'BRAND' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/switch-tenant',
        headers: { cookie: session.cookie },
        payload: { tenantId: session.tenantId },
      });

      expect(res.statusCode).toBe(200);
      expect(readJson<AuthenticatedResponseBody>(res).tenant.id).toBe(session.tenantId);
    });

    it('refuses an organization the user does not belong to', async () => {
      const session = await signup(ctx.app, { accountType: 'BRAND' });
      const other = await signup(ctx.app, { accountType: 'SUPPLIER' });

      const res = await ctx.app.inject({
        method: 'POST',
        url: '/auth/switch-tenant',
        headers: { cookie: session.cookie },
        payload: { tenantId: other.tenantId },
      });

      expect(res.statusCode).toBe(404);
      expect(readJson<ErrorResponseBody>(res).error.message).toBe(
        'You do not have access to this organization.',
      );
    });
  });
});
