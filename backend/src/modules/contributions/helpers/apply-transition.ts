/**
 * src/modules/contributions/helpers/apply-transition.ts
 *
 * WHY:
 * - A workflow action moves the request AND (for most actions) the version it drives.
 *   Both writes happen here so no caller can forget one of them.
 *
 * RULES:
 * - Runs inside the caller's unit of work.
 * - The target status always comes from contribution-state.policy.
 * - The request row is only written when something changes.
 */

import type { Repos } from '../../_shared/persistence/repos';
import type { VersionStatus } from '../../products/product.types';
import type { ContributionPatch, ContributionRequest } from '../contribution.types';
import {
  nextContributionStatus,
  versionStatusAfter,
  type ContributionAction,
} from '../policies/contribution-state.policy';

export type TransitionResult = {
  before: ContributionRequest;
  after: ContributionRequest;
  /** Status written to the request's (pre-transition) current version, if any. */
  versionStatus: VersionStatus | null;
};

export async function applyTransition(
  repos: Repos,
  request: ContributionRequest,
  action: ContributionAction,
): Promise<TransitionResult> {
  const status = nextContributionStatus(action, request.status);
  const versionStatus = versionStatusAfter(action);

  if (versionStatus) {
    await repos.productVersions.update(request.currentVersionId, { status: versionStatus });
  }

  const patch: ContributionPatch = { status };
  const after =
    status === request.status
      ? request
      : await repos.contributionRequests.update(request.id, patch);

  return { before: request, after, versionStatus };
}
