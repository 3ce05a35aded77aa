/**
 * src/modules/contributions/contribution.service.ts
 *
 * WHY:
 * - Orchestrates the data contribution workflow between a brand and one supplier:
 *   assign → accept/decline → save draft* → submit → review (→ rework)* , or cancel.
 * - saveDraft and review are deep flows (flows/*); the rest is orchestrated here.
 *
 * RULES:
 * - Every status change goes through applyTransition (contribution-state.policy).
 * - Neither party → NOT_FOUND; wrong party → FORBIDDEN (accept/decline: NOT_FOUND).
 * - One unit of work per operation. Audit and notifications after commit.
 */

import type { Logger } from '../../shared/logger/logger';
import type { ActingContext } from '../../shared/http/require-auth-context';
import type { AuditSink } from '../../shared/audit/audit.sink';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { Queue } from '../../shared/messaging/queue';
import type { FileStore } from '../../shared/storage/file-store';
import type { AppUnitOfWork } from '../_shared/persistence/repos';

import { ConnectionErrors } from '../connections/connection.errors';
import { ProductErrors } from '../products/product.errors';

import { ContributionErrors } from './contribution.errors';
import {
  auditCommentAdded,
  auditRequestCreated,
  auditRequestTransition,
} from './contribution.audit';
import type {
  CollaborationComment,
  ContributionRequest,
  ContributionRequestDetail,
  ContributionRequestSummary,
} from './contribution.types';
import type { AssignSupplierInput, ReviewInput, SaveDraftInput } from './contribution.schemas';
import type { ContributionAction } from './policies/contribution-state.policy';
import {
  assertAddressedToSupplier,
  assertBrandParty,
  assertSupplierParty,
  resolveParty,
} from './policies/request-party.policy';
import { applyTransition } from './helpers/apply-transition';
import { buildRequestSummaries } from './helpers/build-request-view';
import { loadCurrentVersion, loadRequest } from './helpers/request-loaders';
import {
  executeSaveDraftFlow,
  type SaveDraftResult,
} from './flows/save-draft/execute-save-draft-flow';
import { executeReviewFlow, type ReviewResult } from './flows/review/execute-review-flow';

export type ContributionServiceDeps = {
  uow: AppUnitOfWork;
  logger: Logger;
  auditSink: AuditSink;
  queue: Queue;
  fileStore: FileStore;
};

type PartyCheck = (request: ContributionRequest, tenantId: string) => void;

export class ContributionService {
  constructor(private readonly deps: ContributionServiceDeps) {}

  /** Tells the other side of the request that its status moved. */
  private async notify(ctx: ActingContext, request: ContributionRequest): Promise<void> {
    const notifyTenantId =
      ctx.tenantId === request.brandTenantId ? request.supplierTenantId : request.brandTenantId;

    await this.deps.queue.enqueue({
      type: 'contributions.status_changed',
      requestId: request.id,
      productId: request.productId,
      status: request.status,
      notifyTenantId,
    });
  }

  async assignSupplier(
    ctx: ActingContext,
    productId: string,
    input: AssignSupplierInput,
  ): Promise<ContributionRequest> {
    this.deps.logger.info({
      msg: 'contributions.assign.start',
      flow: 'contributions.assign',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      productId,
      supplierProfileId: input.supplierProfileId,
    });

    const audit = new AuditWriter(ctx);

    const request = await this.deps.uow.transaction(async (repos) => {
      const product = await repos.products.findById(productId);
      if (!product || product.tenantId !== ctx.tenantId) {
        throw ProductErrors.productNotFound({ productId });
      }

      const latest = await repos.productVersions.findLatest(product.id);
      if (!latest) throw ProductErrors.versionNotFound({ productId });
      if (latest.status !== 'WORKING_DRAFT') {
        throw ContributionErrors.versionNotDraft(latest.status, { versionId: latest.id });
      }

      const profile = await repos.supplierProfiles.findById(input.supplierProfileId);
      if (!profile || profile.tenantId !== ctx.tenantId) {
        throw ConnectionErrors.profileNotFound({ profileId: input.supplierProfileId });
      }

      const connection = profile.connectionId
        ? await repos.connections.findById(profile.connectionId)
        : undefined;
      if (!connection || connection.status !== 'ACTIVE' || !connection.targetTenantId) {
        throw ContributionErrors.supplierNotConnected({ profileId: profile.id });
      }

      const open = await repos.contributionRequests.findOpenForVersion(latest.id);
      if (open) throw ContributionErrors.alreadyAssigned({ contributionRequestId: open.id });

      const note = input.note?.trim() || null;
      const created = await repos.contributionRequests.insert({
        brandTenantId: ctx.tenantId,
        supplierTenantId: connection.targetTenantId,
        supplierProfileId: profile.id,
        productId: product.id,
        initialVersionId: latest.id,
        currentVersionId: latest.id,
        dueDate: input.dueDate ?? null,
        requestNote: note,
        createdByUserId: ctx.userId,
      });
      auditRequestCreated(audit, created);

      if (note) {
        const comment = await repos.comments.insert({
          requestId: created.id,
          authorUserId: ctx.userId,
          authorTenantId: ctx.tenantId,
          body: note,
          isRejectionReason: false,
        });
        auditCommentAdded(audit, comment);
      }

      return created;
    });

    this.deps.auditSink.dispatch(audit.drain());
    await this.notify(ctx, request);

    this.deps.logger.info({
      msg: 'contributions.assign.success',
      flow: 'contributions.assign',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      contributionRequestId: request.id,
    });

    return request;
  }

  /**
   * Shared shape of accept / submit / cancel / decline: party check, transition,
   * optional comment, audit and notification.
   */
  private async transition(
    ctx: ActingContext,
    requestId: string,
    action: ContributionAction,
    assertParty: PartyCheck,
    note?: string | null,
  ): Promise<ContributionRequest> {
    const flow = `contributions.${action}`;
    this.deps.logger.info({
      msg: `${flow}.start`,
      flow,
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      contributionRequestId: requestId,
    });

    const audit = new AuditWriter(ctx);
    const body = note?.trim() ?? '';

    const request = await this.deps.uow.transaction(async (repos) => {
      const current = await loadRequest(repos, requestId);
      assertParty(current, ctx.tenantId);

      const transition = await applyTransition(repos, current, action);
      auditRequestTransition(audit, { action, transition });

      if (body) {
        const comment = await repos.comments.insert({
          requestId: current.id,
          authorUserId: ctx.userId,
          authorTenantId: ctx.tenantId,
          body,
          isRejectionReason: false,
        });
        auditCommentAdded(audit, comment);
      }

      return transition.after;
    });

    this.deps.auditSink.dispatch(audit.drain());
    await this.notify(ctx, request);

    this.deps.logger.info({
      msg: `${flow}.success`,
      flow,
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      contributionRequestId: request.id,
      status: request.status,
    });

    return request;
  }

  async accept(ctx: ActingContext, requestId: string): Promise<ContributionRequest> {
    return this.transition(ctx, requestId, 'accept', assertAddressedToSupplier);
  }

  async decline(
    ctx: ActingContext,
    requestId: string,
    note?: string | null,
  ): Promise<ContributionRequest> {
    return this.transition(ctx, requestId, 'decline', assertAddressedToSupplier, note);
  }

  async submit(ctx: ActingContext, requestId: string): Promise<ContributionRequest> {
    return this.transition(ctx, requestId, 'submit', assertSupplierParty);
  }

  async cancel(ctx: ActingContext, requestId: string): Promise<ContributionRequest> {
    return this.transition(ctx, requestId, 'cancel', assertBrandParty);
  }

  async saveDraft(
    ctx: ActingContext,
    requestId: string,
    input: SaveDraftInput,
  ): Promise<SaveDraftResult> {
    const result = await executeSaveDraftFlow(this.deps, ctx, requestId, input);

    if (result.request.status !== result.previousStatus) await this.notify(ctx, result.request);
    return result;
  }

  async review(ctx: ActingContext, requestId: string, input: ReviewInput): Promise<ReviewResult> {
    const result = await executeReviewFlow(this.deps, ctx, requestId, input);
    await this.notify(ctx, result.request);
    return result;
  }

  /** Either party sees the full request; anyone else gets NOT_FOUND. */
  async getRequest(ctx: ActingContext, requestId: string): Promise<ContributionRequestDetail> {
    return this.deps.uow.transaction(async (repos) => {
      const request = await loadRequest(repos, requestId);
      const party = resolveParty(request, ctx.tenantId);

      const version = await loadCurrentVersion(repos, request);
      const children = await repos.versionChildren.list(version.id);
      const comments = await repos.comments.listForRequest(request.id);
      const [summary] = await buildRequestSummaries(repos, [request]);

      return {
        ...request,
        product: summary?.product ?? null,
        brandName: summary?.brandName ?? null,
        supplierName: summary?.supplierName ?? null,
        party,
        version: { ...version, ...children },
        comments,
      };
    });
  }

  /** Supplier inbox: every request addressed to the acting tenant. */
  async listIncoming(ctx: ActingContext): Promise<ContributionRequestSummary[]> {
    return this.deps.uow.transaction(async (repos) => {
      const requests = await repos.contributionRequests.listForSupplier(ctx.tenantId);
      return buildRequestSummaries(repos, requests);
    });
  }

  /** Brand review queue: SUBMITTED requests of the acting tenant. */
  async listPendingReviews(ctx: ActingContext): Promise<ContributionRequestSummary[]> {
    return this.deps.uow.transaction(async (repos) => {
      const requests = await repos.contributionRequests.listForBrand(ctx.tenantId, ['SUBMITTED']);
      return buildRequestSummaries(repos, requests);
    });
  }

  async addComment(
    ctx: ActingContext,
    requestId: string,
    body: string,
  ): Promise<CollaborationComment> {
    const audit = new AuditWriter(ctx);

    const comment = await this.deps.uow.transaction(async (repos) => {
      const request = await loadRequest(repos, requestId);
      resolveParty(request, ctx.tenantId);

      const created = await repos.comments.insert({
        requestId: request.id,
        authorUserId: ctx.userId,
        authorTenantId: ctx.tenantId,
        body,
        isRejectionReason: false,
      });
      auditCommentAdded(audit, created);
      return created;
    });

    this.deps.auditSink.dispatch(audit.drain());

    this.deps.logger.info({
      msg: 'contributions.comment.success',
      flow: 'contributions.comment',
      requestId: ctx.requestId,
      tenantId: ctx.tenantId,
      contributionRequestId: requestId,
    });

    return comment;
  }
}
