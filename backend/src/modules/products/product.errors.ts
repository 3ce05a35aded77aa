/**
 * backend/src/modules/products/product.errors.ts
 *
 * WHY:
 * - Products module owns its domain semantics.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Another tenant's product is reported exactly like a missing one.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ProductErrors = {
  productNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Product not found.', meta);
  },

  versionNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Product version not found.', meta);
  },

  mediaNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Media not found.', meta);
  },

  skuTaken(sku: string, meta?: AppErrorMeta) {
    return AppError.conflict(`A product with SKU "${sku}" already exists.`, { sku, ...meta });
  },

  versionNotEditable(status: string, meta?: AppErrorMeta) {
    return AppError.invalidState(`A ${status} version cannot be edited.`, { status, ...meta });
  },

  versionUnderContribution(meta?: AppErrorMeta) {
    return AppError.invalidState(
      'This version is assigned to a supplier. Cancel the request to edit it.',
      meta,
    );
  },

  nextVersionNotAllowed(status: string, meta?: AppErrorMeta) {
    return AppError.invalidState(
      `A new version can only be started once the latest one is closed (it is ${status}).`,
      { status, ...meta },
    );
  },
} as const;
