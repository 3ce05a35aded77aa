/**
 * src/modules/contributions/flows/review/execute-review-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Rejecting a submission is the heaviest write in the system: old version marked
 *   REVISION_REQUIRED, a revision clone with copied children, the request repointed and
 *   a rejection comment. It commits as one unit or not at all.
 *
 * RULES:
 * - Brand only; requires SUBMITTED.
 * - Reject needs a non-blank comment. The reviewed version is never modified beyond
 *   its status.
 * - Approve: request COMPLETED, version APPROVED, optional comment.
 */

import type { ActingContext } from '../../../../shared/http/require-auth-context';
import type { Logger } from '../../../../shared/logger/logger';
import type { AuditSink } from '../../../../shared/audit/audit.sink';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { AppUnitOfWork } from '../../../_shared/persistence/repos';
import { cloneVersionForRevision } from '../../../products/helpers/clone-version';
import { auditVersionCloned } from '../../../products/product.audit';

import { ContributionErrors } from '../../contribution.errors';
import type { CollaborationComment, ContributionRequest } from '../../contribution.types';
import type { ReviewInput } from '../../contribution.schemas';
import {
  auditCommentAdded,
  auditRequestRepointed,
  auditRequestTransition,
} from '../../contribution.audit';
import { assertBrandParty } from '../../policies/request-party.policy';
import { applyTransition } from '../../helpers/apply-transition';
import { loadCurrentVersion, loadRequest } from '../../helpers/request-loaders';

export type ReviewResult = {
  request: ContributionRequest;
  comment: CollaborationComment | null;
  /** The revision clone the supplier works on next (reject only). */
  revisionVersionId: string | null;
};

export async function executeReviewFlow(
  deps: { uow: AppUnitOfWork; logger: Logger; auditSink: AuditSink },
  ctx: ActingContext,
  requestId: string,
  input: ReviewInput,
): Promise<ReviewResult> {
  const flow = input.approve ? 'contributions.approve' : 'contributions.reject';
  deps.logger.info({
    msg: `${flow}.start`,
    flow,
    requestId: ctx.requestId,
    tenantId: ctx.tenantId,
    contributionRequestId: requestId,
  });

  const audit = new AuditWriter(ctx);
  const commentBody = input.comment?.trim() ?? '';

  const result = await deps.uow.transaction(async (repos): Promise<ReviewResult> => {
    const request = await loadRequest(repos, requestId);
    assertBrandParty(request, ctx.tenantId);

    const reviewed = await loadCurrentVersion(repos, request);
    const transition = await applyTransition(
      repos,
      request,
      input.approve ? 'approve' : 'reject',
    );
    auditRequestTransition(audit, {
      action: input.approve ? 'approve' : 'reject',
      transition,
    });

    if (input.approve) {
      let comment: CollaborationComment | null = null;
      if (commentBody) {
        comment = await repos.comments.insert({
          requestId: request.id,
          authorUserId: ctx.userId,
          authorTenantId: ctx.tenantId,
          body: commentBody,
          isRejectionReason: false,
        });
        auditCommentAdded(audit, comment);
      }
      return { request: transition.after, comment, revisionVersionId: null };
    }

    if (!commentBody) throw ContributionErrors.rejectionCommentRequired({ requestId });

    const children = await repos.versionChildren.list(reviewed.id);
    const clone = cloneVersionForRevision(reviewed, children);
    const revision = await repos.productVersions.insert(clone.version);
    await repos.versionChildren.replace(revision.id, clone.children);

    const repointed = await repos.contributionRequests.update(request.id, {
      currentVersionId: revision.id,
    });

    const comment = await repos.comments.insert({
      requestId: request.id,
      authorUserId: ctx.userId,
      authorTenantId: ctx.tenantId,
      body: commentBody,
      isRejectionReason: true,
    });

    auditVersionCloned(audit, { source: reviewed, clone: revision, children: clone.children });
    auditRequestRepointed(audit, {
      requestId: request.id,
      fromVersionId: reviewed.id,
      toVersionId: revision.id,
    });
    auditCommentAdded(audit, comment);

    return { request: repointed, comment, revisionVersionId: revision.id };
  });

  deps.auditSink.dispatch(audit.drain());

  deps.logger.info({
    msg: `${flow}.success`,
    flow,
    requestId: ctx.requestId,
    tenantId: ctx.tenantId,
    contributionRequestId: requestId,
    status: result.request.status,
    revisionVersionId: result.revisionVersionId,
  });

  return result;
}
