/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth rate limits that are not deployment-tunable.
 * - The per-email login limit comes from config (LOGIN_RATE_LIMIT).
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const AUTH_RATE_LIMITS = {
  login: {
    perIp: { limit: 20, windowSeconds: 900 },
  },
  signup: {
    perEmail: { limit: 5, windowSeconds: 900 },
    perIp: { limit: 20, windowSeconds: 900 },
  },
} as const;
