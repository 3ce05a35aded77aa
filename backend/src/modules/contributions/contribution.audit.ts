/**
 * src/modules/contributions/contribution.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the contribution workflow.
 *
 * RULES:
 * - No DB access (records into AuditWriter).
 * - Comment bodies and file bytes are never copied into changes.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { VersionChildrenInput, VersionPatch } from '../products/product.types';
import type {
  CollaborationComment,
  ContributionRequest,
  SupplierArtifact,
} from './contribution.types';
import type { TransitionResult } from './helpers/apply-transition';

export function auditRequestCreated(writer: AuditWriter, request: ContributionRequest): void {
  writer.record('DataContributionRequest', request.id, 'CREATE', {
    productId: request.productId,
    versionId: request.initialVersionId,
    supplierTenantId: request.supplierTenantId,
    status: request.status,
  });
}

export function auditRequestTransition(
  writer: AuditWriter,
  data: { action: string; transition: TransitionResult },
): void {
  const { before, after, versionStatus } = data.transition;
  writer.record('DataContributionRequest', after.id, 'UPDATE', {
    action: data.action,
    fromStatus: before.status,
    toStatus: after.status,
  });
  if (versionStatus) {
    writer.record('ProductVersion', before.currentVersionId, 'UPDATE', {
      status: versionStatus,
    });
  }
}

export function auditRequestRepointed(
  writer: AuditWriter,
  data: { requestId: string; fromVersionId: string; toVersionId: string },
): void {
  writer.record('DataContributionRequest', data.requestId, 'UPDATE', {
    currentVersionId: data.toVersionId,
    previousVersionId: data.fromVersionId,
  });
}

export function auditDraftSaved(
  writer: AuditWriter,
  data: { versionId: string; scalars: VersionPatch; children: VersionChildrenInput },
): void {
  writer.record('ProductVersion', data.versionId, 'UPDATE', {
    reason: 'draft_saved',
    ...data.scalars,
    materials: data.children.materials.length,
    suppliers: data.children.suppliers.length,
    certifications: data.children.certifications.length,
  });
}

export function auditArtifactCreated(writer: AuditWriter, artifact: SupplierArtifact): void {
  writer.record('SupplierArtifact', artifact.id, 'CREATE', {
    fileName: artifact.fileName,
    contentType: artifact.contentType,
    sizeBytes: artifact.sizeBytes,
  });
}

export function auditCommentAdded(writer: AuditWriter, comment: CollaborationComment): void {
  writer.record('CollaborationComment', comment.id, 'CREATE', {
    requestId: comment.requestId,
    isRejectionReason: comment.isRejectionReason,
  });
}
