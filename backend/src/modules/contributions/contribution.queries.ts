/**
 * backend/src/modules/contributions/contribution.queries.ts
 *
 * WHY:
 * - Shapes request, comment and artifact rows into domain types.
 *
 * RULES:
 * - Pure mapping only.
 * - Unknown statuses map to CANCELLED (terminal, never editable).
 */

import type { Selectable } from 'kysely';
import type {
  CollaborationCommentsTable,
  ContributionRequestsTable,
  SupplierArtifactsTable,
} from '../../shared/db/tables';
import {
  CONTRIBUTION_STATUSES,
  type CollaborationComment,
  type ContributionRequest,
  type ContributionStatus,
  type SupplierArtifact,
} from './contribution.types';

export function parseContributionStatus(value: string): ContributionStatus {
  return CONTRIBUTION_STATUSES.find((s) => s === value) ?? 'CANCELLED';
}

export function toContributionRequest(
  row: Selectable<ContributionRequestsTable>,
): ContributionRequest {
  return {
    id: row.id,
    brandTenantId: row.brand_tenant_id,
    supplierTenantId: row.supplier_tenant_id,
    supplierProfileId: row.supplier_profile_id,
    productId: row.product_id,
    initialVersionId: row.initial_version_id,
    currentVersionId: row.current_version_id,
    status: parseContributionStatus(row.status),
    dueDate: row.due_date,
    requestNote: row.request_note,
    createdByUserId: row.created_by_user_id,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toCollaborationComment(
  row: Selectable<CollaborationCommentsTable>,
): CollaborationComment {
  return {
    id: row.id,
    requestId: row.request_id,
    authorUserId: row.author_user_id,
    authorTenantId: row.author_tenant_id,
    body: row.body,
    isRejectionReason: row.is_rejection_reason,
    createdAt: row.created_at,
  };
}

export function toSupplierArtifact(row: Selectable<SupplierArtifactsTable>): SupplierArtifact {
  return {
    id: row.id,
    tenantId: row.tenant_id,
    kind: 'CERTIFICATE',
    fileName: row.file_name,
    fileUrl: row.file_url,
    contentType: row.content_type,
    sizeBytes: row.size_bytes,
    createdAt: row.created_at,
  };
}
