/**
 * src/modules/contributions/helpers/request-loaders.ts
 *
 * WHY:
 * - Every workflow step starts by loading the request and, usually, the version it drives.
 *
 * RULES:
 * - Runs inside the caller's unit of work (takes Repos).
 * - Party checks stay with the caller (request-party.policy).
 */

import type { Repos } from '../../_shared/persistence/repos';
import { ProductErrors } from '../../products/product.errors';
import type { ProductVersion } from '../../products/product.types';
import type { ContributionRequest } from '../contribution.types';
import { assertRequestExists } from '../policies/request-party.policy';

export async function loadRequest(repos: Repos, requestId: string): Promise<ContributionRequest> {
  const request = await repos.contributionRequests.findById(requestId);
  assertRequestExists(request, requestId);
  return request;
}

export async function loadCurrentVersion(
  repos: Repos,
  request: ContributionRequest,
): Promise<ProductVersion> {
  const version = await repos.productVersions.findById(request.currentVersionId);
  if (!version) {
    throw ProductErrors.versionNotFound({
      requestId: request.id,
      versionId: request.currentVersionId,
    });
  }
  return version;
}
