/**
 * backend/src/modules/tenants/tenant.errors.ts
 *
 * WHY:
 * - Tenants module owns its domain semantics.
 * - Keeps shared/http/errors.ts small and stable.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Put tenant-specific meaning here: messages + safe meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const TenantErrors = {
  tenantNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Tenant not found', meta);
  },

  tenantSuspended(meta?: AppErrorMeta) {
    return AppError.forbidden('Organization is suspended', meta);
  },

  nameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('An organization with this company name already exists.', meta);
  },

  notBrand(meta?: AppErrorMeta) {
    return AppError.forbidden('Only brand organizations can perform this action.', meta);
  },

  slugExhausted(meta?: AppErrorMeta) {
    return AppError.internal('Could not generate a unique handle for this organization.', meta);
  },
} as const;
