/**
 * backend/src/modules/contributions/dal/contribution.repo.ts
 *
 * WHY:
 * - Persistence ports for contribution requests, comments and supplier artifacts
 *   + Kysely implementations.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - Status rules live in contribution-state.policy.ts, not here.
 */

import type { Updateable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { ContributionRequestsTable } from '../../../shared/db/tables';
import {
  toCollaborationComment,
  toContributionRequest,
  toSupplierArtifact,
} from '../contribution.queries';
import {
  OPEN_CONTRIBUTION_STATUSES,
  type CollaborationComment,
  type ContributionPatch,
  type ContributionRequest,
  type ContributionStatus,
  type NewCollaborationComment,
  type NewContributionRequest,
  type NewSupplierArtifact,
  type SupplierArtifact,
} from '../contribution.types';

export interface ContributionRequestRepo {
  findById(id: string): Promise<ContributionRequest | undefined>;
  /** The open (non-terminal) request whose current version is versionId, if any. */
  findOpenForVersion(versionId: string): Promise<ContributionRequest | undefined>;
  /** The most recent request whose current version is versionId, whatever its status. */
  findLatestForVersion(versionId: string): Promise<ContributionRequest | undefined>;
  listForSupplier(supplierTenantId: string): Promise<ContributionRequest[]>;
  listForBrand(
    brandTenantId: string,
    statuses: readonly ContributionStatus[],
  ): Promise<ContributionRequest[]>;
  insert(input: NewContributionRequest): Promise<ContributionRequest>;
  update(id: string, patch: ContributionPatch): Promise<ContributionRequest>;
}

export interface CommentRepo {
  insert(input: NewCollaborationComment): Promise<CollaborationComment>;
  listForRequest(requestId: string): Promise<CollaborationComment[]>;
}

export interface SupplierArtifactRepo {
  insert(input: NewSupplierArtifact): Promise<SupplierArtifact>;
}

export class SqlContributionRequestRepo implements ContributionRequestRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<ContributionRequest | undefined> {
    const row = await this.db
      .selectFrom('contribution_requests')
      .selectAll()
      .where('id', '=', id)
      .executeTakeFirst();
    return row ? toContributionRequest(row) : undefined;
  }

  async findOpenForVersion(versionId: string): Promise<ContributionRequest | undefined> {
    const row = await this.db
      .selectFrom('contribution_requests')
      .selectAll()
      .where('current_version_id', '=', versionId)
      .where('status', 'in', [...OPEN_CONTRIBUTION_STATUSES])
      .executeTakeFirst();
    return row ? toContributionRequest(row) : undefined;
  }

  async findLatestForVersion(versionId: string): Promise<ContributionRequest | undefined> {
    const row = await this.db
      .selectFrom('contribution_requests')
      .selectAll()
      .where('current_version_id', '=', versionId)
      .orderBy('created_at', 'desc')
      .limit(1)
      .executeTakeFirst();
    return row ? toContributionRequest(row) : undefined;
  }

  async listForSupplier(supplierTenantId: string): Promise<ContributionRequest[]> {
    const rows = await this.db
      .selectFrom('contribution_requests')
      .selectAll()
      .where('supplier_tenant_id', '=', supplierTenantId)
      .orderBy('updated_at', 'desc')
      .execute();
    return rows.map(toContributionRequest);
  }

  async listForBrand(
    brandTenantId: string,
    statuses: readonly ContributionStatus[],
  ): Promise<ContributionRequest[]> {
    if (statuses.length === 0) return [];
    const rows = await this.db
      .selectFrom('contribution_requests')
      .selectAll()
      .where('brand_tenant_id', '=', brandTenantId)
      .where('status', 'in', [...statuses])
      .orderBy('updated_at', 'desc')
      .execute();
    return rows.map(toContributionRequest);
  }

  async insert(input: NewContributionRequest): Promise<ContributionRequest> {
    const row = await this.db
      .insertInto('contribution_requests')
      .values({
        brand_tenant_id: input.brandTenantId,
        supplier_tenant_id: input.supplierTenantId,
        supplier_profile_id: input.supplierProfileId,
        product_id: input.productId,
        initial_version_id: input.initialVersionId,
        current_version_id: input.currentVersionId,
        status: 'SENT',
        due_date: input.dueDate,
        request_note: input.requestNote,
        created_by_user_id: input.createdByUserId,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toContributionRequest(row);
  }

  async update(id: string, patch: ContributionPatch): Promise<ContributionRequest> {
    const values: Updateable<ContributionRequestsTable> = { updated_at: new Date() };
    if (patch.status !== undefined) values.status = patch.status;
    if (patch.currentVersionId !== undefined) values.current_version_id = patch.currentVersionId;

    const row = await this.db
      .updateTable('contribution_requests')
      .set(values)
      .where('id', '=', id)
      .returningAll()
      .executeTakeFirstOrThrow();
    return toContributionRequest(row);
  }
}

export class SqlCommentRepo implements CommentRepo {
  constructor(private readonly db: DbExecutor) {}

  async insert(input: NewCollaborationComment): Promise<CollaborationComment> {
    const row = await this.db
      .insertInto('collaboration_comments')
      .values({
        request_id: input.requestId,
        author_user_id: input.authorUserId,
        author_tenant_id: input.authorTenantId,
        body: input.body,
        is_rejection_reason: input.isRejectionReason,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toCollaborationComment(row);
  }

  async listForRequest(requestId: string): Promise<CollaborationComment[]> {
    const rows = await this.db
      .selectFrom('collaboration_comments')
      .selectAll()
      .where('request_id', '=', requestId)
      .orderBy('created_at')
      .execute();
    return rows.map(toCollaborationComment);
  }
}

export class SqlSupplierArtifactRepo implements SupplierArtifactRepo {
  constructor(private readonly db: DbExecutor) {}

  async insert(input: NewSupplierArtifact): Promise<SupplierArtifact> {
    const row = await this.db
      .insertInto('supplier_artifacts')
      .values({
        tenant_id: input.tenantId,
        kind: input.kind,
        file_name: input.fileName,
        file_url: input.fileUrl,
        content_type: input.contentType,
        size_bytes: input.sizeBytes,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toSupplierArtifact(row);
  }
}
