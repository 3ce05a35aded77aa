import { describe, it, expect } from 'vitest';
import type { FastifyRequest } from 'fastify';
import { AppError } from '../../../../src/shared/http/errors';
import {
  requireActingContext,
  requireSession,
} from '../../../../src/shared/http/require-auth-context';

function makeReq(authContext: unknown): FastifyRequest {
  return { authContext, requestContext: { requestId: 'req-1' } } as unknown as FastifyRequest;
}

const SESSION = {
  sessionId: 'sess_1',
  userId: 'usr_1',
  tenantId: 'ten_1',
  membershipId: 'mem_1',
  role: 'MEMBER',
};

describe('requireSession', () => {
  it('throws 401 when no session is present', () => {
    try {
      requireSession(makeReq(null));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.status).toBe(401);
      expect(e.message).toBe('Authentication required');
    }
  });

  it('throws 401 when the session has no acting tenant', () => {
    expect(() => requireSession(makeReq({ ...SESSION, tenantId: null }))).toThrowError(
      'Authentication required',
    );
  });

  it('throws 403 when role requirement is not met', () => {
    try {
      requireSession(makeReq(SESSION), { role: 'ADMIN' });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(AppError);
      const e = err as AppError;
      expect(e.status).toBe(403);
      expect(e.message).toBe('Insufficient role.');
    }
  });

  it('returns the session when valid', () => {
    expect(requireSession(makeReq(SESSION))).toEqual(SESSION);
  });
});

describe('requireActingContext', () => {
  it('carries the request id and drops the session id', () => {
    expect(requireActingContext(makeReq(SESSION))).toEqual({
      userId: 'usr_1',
      tenantId: 'ten_1',
      membershipId: 'mem_1',
      role: 'MEMBER',
      requestId: 'req-1',
    });
  });
});
