/**
 * src/modules/contributions/helpers/build-request-view.ts
 *
 * WHY:
 * - List and detail views show the product and both organization names next to the
 *   request, so clients need no follow-up lookups.
 *
 * RULES:
 * - Runs inside the caller's unit of work.
 * - Read-only.
 */

import type { Repos } from '../../_shared/persistence/repos';
import type { Product } from '../../products/product.types';
import type { ContributionRequest, ContributionRequestSummary } from '../contribution.types';

export async function buildRequestSummaries(
  repos: Repos,
  requests: readonly ContributionRequest[],
): Promise<ContributionRequestSummary[]> {
  if (requests.length === 0) return [];

  const tenantIds = new Set<string>();
  for (const r of requests) {
    tenantIds.add(r.brandTenantId);
    tenantIds.add(r.supplierTenantId);
  }
  const tenants = await repos.tenants.findManyByIds([...tenantIds]);
  const tenantNames = new Map(tenants.map((t) => [t.id, t.name]));

  const products = new Map<string, Product | undefined>();
  for (const r of requests) {
    if (!products.has(r.productId)) {
      products.set(r.productId, await repos.products.findById(r.productId));
    }
  }

  return requests.map((r) => {
    const product = products.get(r.productId);
    return {
      ...r,
      product: product
        ? { id: product.id, sku: product.sku, name: product.name, category: product.category }
        : null,
      brandName: tenantNames.get(r.brandTenantId) ?? null,
      supplierName: tenantNames.get(r.supplierTenantId) ?? null,
    };
  });
}
