/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Connection invitation tokens must be unguessable and URL-safe.
 *
 * HOW TO USE:
 * - const token = generateSecureToken()
 * - Put the raw token in the invitation link only; persist tokenHasher.hash(token).
 */

import { randomBytes } from 'node:crypto';

export const DEFAULT_TOKEN_BYTES = 32;

export function generateSecureToken(bytes: number = DEFAULT_TOKEN_BYTES): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
