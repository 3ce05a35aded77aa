/**
 * backend/src/modules/contributions/contribution.errors.ts
 *
 * WHY:
 * - Contributions module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - A tenant that is neither party of a request sees NOT_FOUND.
 * - A brand trying a supplier-only action sees FORBIDDEN (and vice versa).
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ContributionErrors = {
  requestNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Contribution request not found.', meta);
  },

  supplierOnly(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the assigned supplier can perform this action.', meta);
  },

  brandOnly(meta?: AppErrorMeta) {
    return AppError.forbidden('Only the requesting brand can perform this action.', meta);
  },

  transitionNotAllowed(action: string, status: string, meta?: AppErrorMeta) {
    return AppError.invalidState(`Cannot ${action} a request that is ${status}.`, {
      action,
      status,
      ...meta,
    });
  },

  requestLocked(status: string, meta?: AppErrorMeta) {
    return AppError.locked(`This request is ${status} and can no longer be edited.`, {
      status,
      ...meta,
    });
  },

  rejectionCommentRequired(meta?: AppErrorMeta) {
    return AppError.validationError('A comment is required when requesting changes.', meta);
  },

  versionNotDraft(status: string, meta?: AppErrorMeta) {
    return AppError.invalidState(
      `Only a working draft can be assigned to a supplier (latest version is ${status}).`,
      { status, ...meta },
    );
  },

  supplierNotConnected(meta?: AppErrorMeta) {
    return AppError.invalidState(
      'This supplier has not accepted your connection request yet.',
      meta,
    );
  },

  alreadyAssigned(meta?: AppErrorMeta) {
    return AppError.conflict('This version already has an open contribution request.', meta);
  },

  invalidUpload(meta?: AppErrorMeta) {
    return AppError.validationError('Uploaded file content is not valid base64.', meta);
  },
} as const;
