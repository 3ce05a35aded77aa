/**
 * backend/src/modules/contributions/contribution.types.ts
 *
 * WHY:
 * - A DataContributionRequest asks one supplier to fill in one product version.
 * - initialVersionId never moves; currentVersionId follows each rework (revision clone).
 *
 * RULES:
 * - At most one open (non-terminal) request drives a given version.
 * - The supplier may edit only the current version, and only while the request is
 *   SENT, IN_PROGRESS or CHANGES_REQUESTED.
 */

import type { Product, VersionWithChildren } from '../products/product.types';

export const CONTRIBUTION_STATUSES = [
  'SENT',
  'IN_PROGRESS',
  'SUBMITTED',
  'CHANGES_REQUESTED',
  'COMPLETED',
  'DECLINED',
  'CANCELLED',
] as const;
export type ContributionStatus = (typeof CONTRIBUTION_STATUSES)[number];

export const OPEN_CONTRIBUTION_STATUSES: readonly ContributionStatus[] = [
  'SENT',
  'IN_PROGRESS',
  'SUBMITTED',
  'CHANGES_REQUESTED',
];

export type ContributionRequest = {
  id: string;
  brandTenantId: string;
  supplierTenantId: string;
  supplierProfileId: string | null;
  productId: string;
  initialVersionId: string;
  currentVersionId: string;
  status: ContributionStatus;
  dueDate: Date | null;
  requestNote: string | null;
  createdByUserId: string;

  createdAt: Date;
  updatedAt: Date;
};

export type NewContributionRequest = Omit<
  ContributionRequest,
  'id' | 'status' | 'createdAt' | 'updatedAt'
>;

export type ContributionPatch = Partial<Pick<ContributionRequest, 'status' | 'currentVersionId'>>;

export type CollaborationComment = {
  id: string;
  requestId: string;
  authorUserId: string;
  authorTenantId: string;
  body: string;
  isRejectionReason: boolean;
  createdAt: Date;
};

export type NewCollaborationComment = Omit<CollaborationComment, 'id' | 'createdAt'>;

export type ArtifactKind = 'CERTIFICATE';

export type SupplierArtifact = {
  id: string;
  tenantId: string;
  kind: ArtifactKind;
  fileName: string;
  fileUrl: string;
  contentType: string;
  sizeBytes: number;
  createdAt: Date;
};

export type NewSupplierArtifact = Omit<SupplierArtifact, 'id' | 'createdAt'>;

/** Which side of a request the acting tenant is on. */
export type RequestParty = 'BRAND' | 'SUPPLIER';

// ── Read models ───────────────────────────────────────────────

export type ContributionRequestSummary = ContributionRequest & {
  product: Pick<Product, 'id' | 'sku' | 'name' | 'category'> | null;
  brandName: string | null;
  supplierName: string | null;
};

export type ContributionRequestDetail = ContributionRequestSummary & {
  /** Side of the request the caller is on. */
  party: RequestParty;
  version: VersionWithChildren;
  comments: CollaborationComment[];
};
