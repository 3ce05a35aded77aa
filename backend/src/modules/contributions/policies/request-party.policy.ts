/**
 * backend/src/modules/contributions/policies/request-party.policy.ts
 *
 * WHY:
 * - Every request operation first decides which side the acting tenant is on.
 *
 * RULES:
 * - Neither party -> NOT_FOUND (existence is not revealed).
 * - Wrong party for the action -> FORBIDDEN.
 */

import { ContributionErrors } from '../contribution.errors';
import type { ContributionRequest, RequestParty } from '../contribution.types';

export function assertRequestExists(
  request: ContributionRequest | undefined,
  requestId: string,
): asserts request is ContributionRequest {
  if (!request) throw ContributionErrors.requestNotFound({ requestId });
}

export function resolveParty(request: ContributionRequest, tenantId: string): RequestParty {
  if (request.supplierTenantId === tenantId) return 'SUPPLIER';
  if (request.brandTenantId === tenantId) return 'BRAND';
  throw ContributionErrors.requestNotFound({ requestId: request.id });
}

export function assertSupplierParty(request: ContributionRequest, tenantId: string): void {
  if (resolveParty(request, tenantId) !== 'SUPPLIER') {
    throw ContributionErrors.supplierOnly({ requestId: request.id });
  }
}

export function assertBrandParty(request: ContributionRequest, tenantId: string): void {
  if (resolveParty(request, tenantId) !== 'BRAND') {
    throw ContributionErrors.brandOnly({ requestId: request.id });
  }
}

/** accept / decline: only the supplier even knows the request is addressed to it. */
export function assertAddressedToSupplier(request: ContributionRequest, tenantId: string): void {
  if (request.supplierTenantId !== tenantId) {
    throw ContributionErrors.requestNotFound({ requestId: request.id });
  }
}
