/**
 * backend/src/modules/connections/connection.errors.ts
 *
 * WHY:
 * - Connections module owns its domain semantics.
 *
 * SECURITY:
 * - Token failures must not leak whether a token exists (always NOT_FOUND).
 * - A connection addressed to someone else is reported as NOT_FOUND.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include raw tokens in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ConnectionErrors = {
  invitationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Invitation not found or no longer valid.', meta);
  },

  connectionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Connection not found.', meta);
  },

  profileNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Supplier profile not found.', meta);
  },

  targetNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('No organization found with this handle.', meta);
  },

  targetNotSupplier(meta?: AppErrorMeta) {
    return AppError.invalidRole('The target organization is not a supplier.', meta);
  },

  cannotConnectToSelf(meta?: AppErrorMeta) {
    return AppError.invalidRole('You cannot connect to your own organization.', meta);
  },

  alreadyConnected(meta?: AppErrorMeta) {
    return AppError.conflict('A connection with this supplier already exists.', meta);
  },

  profileNameTaken(name: string, meta?: AppErrorMeta) {
    return AppError.conflict(`A supplier profile named "${name}" already exists.`, meta);
  },

  transitionNotAllowed(from: string, to: string, meta?: AppErrorMeta) {
    return AppError.invalidState(`Cannot move a connection from ${from} to ${to}.`, {
      from,
      to,
      ...meta,
    });
  },

  notPending(meta?: AppErrorMeta) {
    return AppError.invalidState('This connection request is no longer pending.', meta);
  },

  reinviteNotAllowed(status: string, meta?: AppErrorMeta) {
    return AppError.invalidState(`Cannot resend an invitation for a ${status} connection.`, {
      status,
      ...meta,
    });
  },

  retryLimitReached(max: number, meta?: AppErrorMeta) {
    return AppError.limitExceeded(`Invitation retry limit (${max}) reached.`, { max, ...meta });
  },
} as const;
