/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Signup, login and logout all set or clear the same cookie with the same flags.
 * - HttpOnly / SameSite=Strict / Secure (prod) rules live in one place.
 *
 * RULES:
 * - No business logic here.
 * - No DB access here.
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

export type SessionCookieOptions = {
  isProduction: boolean;
  maxAgeSeconds: number;
};

function baseAttributes(isProduction: boolean): string[] {
  const parts = ['Path=/', 'HttpOnly', 'SameSite=Strict'];
  if (isProduction) parts.push('Secure');
  return parts;
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: SessionCookieOptions,
): void {
  const parts = [
    `${SESSION_COOKIE_NAME}=${sessionId}`,
    ...baseAttributes(opts.isProduction),
    `Max-Age=${opts.maxAgeSeconds}`,
  ];

  reply.header('Set-Cookie', parts.join('; '));
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  const parts = [`${SESSION_COOKIE_NAME}=`, ...baseAttributes(isProduction), 'Max-Age=0'];

  reply.header('Set-Cookie', parts.join('; '));
}
