/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, tokens, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown email, wrong password or deactivated user. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid email or password.', meta);
  },

  /** The session expired between the auth check and the update. */
  sessionExpired(meta?: AppErrorMeta) {
    return AppError.unauthorized('Authentication required', meta);
  },

  emailTaken(meta?: AppErrorMeta) {
    return AppError.conflict('An account with this email already exists. Please sign in.', meta);
  },

  accountSuspended(meta?: AppErrorMeta) {
    return AppError.forbidden('Your account has been suspended.', meta);
  },

  inviteNotYetAccepted(meta?: AppErrorMeta) {
    return AppError.conflict('Please accept your invite before signing in.', meta);
  },

  noAccess(meta?: AppErrorMeta) {
    return AppError.forbidden("You don't have access to this organization.", meta);
  },
} as const;
