/**
 * src/modules/contributions/flows/save-draft/execute-save-draft-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - A draft save touches the request, the version scalars, all three child collections,
 *   the file store and the supplier vault. Keeping it out of the service keeps the
 *   service readable.
 *
 * RULES:
 * - Supplier only; outside SENT / IN_PROGRESS / CHANGES_REQUESTED the request is LOCKED.
 * - Scalars: merge-patch (non-null values only).
 * - Children: full replace. A missing list is an empty list.
 * - Certificate content type:
 *     upload  → declared MIME → extension guess → application/octet-stream
 *     fileUrl → extension guess → application/octet-stream
 * - Linked reference rows / supplier profiles must be visible to the supplier (NOT_FOUND).
 * - Every upload is decoded before the first file is stored. Files stored during a unit
 *   of work that then fails are deleted again.
 * - One unit of work. Audit dispatched after commit.
 */

import type { ActingContext } from '../../../../shared/http/require-auth-context';
import type { Logger } from '../../../../shared/logger/logger';
import type { AuditSink } from '../../../../shared/audit/audit.sink';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { FileStore } from '../../../../shared/storage/file-store';
import {
  resolveUploadContentType,
  resolveUrlContentType,
} from '../../../../shared/storage/content-type';
import type { AppUnitOfWork, Repos } from '../../../_shared/persistence/repos';
import type {
  VersionCertificationInput,
  VersionChildrenInput,
  VersionWithChildren,
} from '../../../products/product.types';

import { ContributionErrors } from '../../contribution.errors';
import type {
  ContributionRequest,
  ContributionStatus,
  SupplierArtifact,
} from '../../contribution.types';
import type { DraftCertificationInput, SaveDraftInput } from '../../contribution.schemas';
import {
  auditArtifactCreated,
  auditDraftSaved,
  auditRequestTransition,
} from '../../contribution.audit';
import { assertSupplierParty } from '../../policies/request-party.policy';
import { applyTransition } from '../../helpers/apply-transition';
import { assertDraftReferencesVisible } from '../../helpers/check-draft-references';
import { decodeBase64Strict } from '../../helpers/decode-upload';
import { hasScalarChanges, mergeDraftScalars } from '../../helpers/merge-draft-scalars';
import { loadCurrentVersion, loadRequest } from '../../helpers/request-loaders';

export type SaveDraftResult = {
  request: ContributionRequest;
  previousStatus: ContributionStatus;
  version: VersionWithChildren;
  artifacts: SupplierArtifact[];
};

/** Last path segment of a URL, used when a linked certificate has no file name. */
export function fileNameFromUrl(fileUrl: string): string {
  const path = fileUrl.split(/[?#]/)[0] ?? '';
  const last = path.split('/').pop() ?? '';
  return last || 'certificate';
}

type PreparedCertificate = {
  entry: DraftCertificationInput;
  upload: { bytes: Buffer; contentType: string } | null;
};

/** Decodes every upload up front; the first invalid one fails the whole save. */
function prepareCertificates(entries: readonly DraftCertificationInput[]): PreparedCertificate[] {
  return entries.map((entry) => {
    if (!entry.upload) return { entry, upload: null };

    const bytes = decodeBase64Strict(entry.upload.dataBase64);
    if (!bytes) throw ContributionErrors.invalidUpload({ fileName: entry.upload.fileName });

    const contentType = resolveUploadContentType({
      declared: entry.upload.contentType,
      fileName: entry.upload.fileName,
    });
    return { entry, upload: { bytes, contentType } };
  });
}

async function resolveCertificate(
  fileStore: FileStore,
  repos: Repos,
  ctx: ActingContext,
  prepared: PreparedCertificate,
  sink: { artifacts: SupplierArtifact[]; storedKeys: string[] },
): Promise<VersionCertificationInput> {
  const { entry, upload } = prepared;
  const base = {
    certificationId: entry.certificationId ?? null,
    certificateDefinitionId: entry.certificateDefinitionId ?? null,
    name: entry.name,
    validUntil: entry.validUntil ?? null,
    referenceNumber: entry.referenceNumber ?? null,
  };

  if (entry.upload && upload) {
    const fileName = entry.upload.fileName;
    const stored = await fileStore.save({
      tenantId: ctx.tenantId,
      fileName,
      contentType: upload.contentType,
      bytes: upload.bytes,
    });
    sink.storedKeys.push(stored.key);

    const artifact = await repos.supplierArtifacts.insert({
      tenantId: ctx.tenantId,
      kind: 'CERTIFICATE',
      fileName,
      fileUrl: stored.url,
      contentType: upload.contentType,
      sizeBytes: stored.sizeBytes,
    });
    sink.artifacts.push(artifact);

    return {
      ...base,
      fileUrl: stored.url,
      fileName,
      fileType: upload.contentType,
      sourceArtifactId: artifact.id,
    };
  }

  const fileUrl = entry.fileUrl ?? '';
  return {
    ...base,
    fileUrl,
    fileName: entry.fileName ?? fileNameFromUrl(fileUrl),
    fileType: resolveUrlContentType(fileUrl),
    sourceArtifactId: null,
  };
}

/** Removes files stored by a unit of work that did not commit. */
async function discardStoredFiles(
  deps: { fileStore: FileStore; logger: Logger },
  ctx: ActingContext,
  keys: readonly string[],
): Promise<void> {
  const results = await Promise.allSettled(keys.map((key) => deps.fileStore.delete(key)));
  results.forEach((result, i) => {
    if (result.status === 'rejected') {
      deps.logger.error({
        msg: 'contributions.save_draft.discard_file_failed',
        flow: 'contributions.save_draft',
        requestId: ctx.requestId,
        tenantId: ctx.tenantId,
        key: keys[i],
        err: result.reason,
      });
    }
  });
}

export async function executeSaveDraftFlow(
  deps: { uow: AppUnitOfWork; fileStore: FileStore; logger: Logger; auditSink: AuditSink },
  ctx: ActingContext,
  requestId: string,
  input: SaveDraftInput,
): Promise<SaveDraftResult> {
  deps.logger.info({
    msg: 'contributions.save_draft.start',
    flow: 'contributions.save_draft',
    requestId: ctx.requestId,
    tenantId: ctx.tenantId,
    contributionRequestId: requestId,
  });

  const audit = new AuditWriter(ctx);
  const sink: { artifacts: SupplierArtifact[]; storedKeys: string[] } = {
    artifacts: [],
    storedKeys: [],
  };

  const run = () =>
    deps.uow.transaction(async (repos): Promise<SaveDraftResult> => {
      const request = await loadRequest(repos, requestId);
      assertSupplierParty(request, ctx.tenantId);

      const transition = await applyTransition(repos, request, 'save_draft');
      const version = await loadCurrentVersion(repos, request);

      await assertDraftReferencesVisible(repos, ctx.tenantId, input);
      const prepared = prepareCertificates(input.certifications ?? []);

      const scalars = mergeDraftScalars(input);
      const updated = hasScalarChanges(scalars)
        ? await repos.productVersions.update(version.id, scalars)
        : version;

      const certifications: VersionCertificationInput[] = [];
      for (const entry of prepared) {
        certifications.push(await resolveCertificate(deps.fileStore, repos, ctx, entry, sink));
      }

      const children: VersionChildrenInput = {
        materials: (input.materials ?? []).map((m) => ({
          materialId: m.materialId ?? null,
          materialDefinitionId: m.materialDefinitionId ?? null,
          name: m.name,
          percentage: m.percentage,
          originCountry: m.originCountry,
          transportMethod: m.transportMethod ?? null,
        })),
        suppliers: (input.suppliers ?? []).map((s) => ({
          supplierProfileId: s.supplierProfileId ?? null,
          name: s.name,
          role: s.role,
          country: s.country,
        })),
        certifications,
      };
      const saved = await repos.versionChildren.replace(version.id, children);

      for (const artifact of sink.artifacts) auditArtifactCreated(audit, artifact);
      auditDraftSaved(audit, { versionId: version.id, scalars, children });
      if (transition.after.status !== transition.before.status) {
        auditRequestTransition(audit, { action: 'save_draft', transition });
      }

      return {
        request: transition.after,
        previousStatus: transition.before.status,
        version: { ...updated, ...saved },
        artifacts: [...sink.artifacts],
      };
    });

  let result: SaveDraftResult;
  try {
    result = await run();
  } catch (err) {
    await discardStoredFiles(deps, ctx, sink.storedKeys);
    throw err;
  }

  deps.auditSink.dispatch(audit.drain());

  deps.logger.info({
    msg: 'contributions.save_draft.success',
    flow: 'contributions.save_draft',
    requestId: ctx.requestId,
    tenantId: ctx.tenantId,
    contributionRequestId: requestId,
    status: result.request.status,
    uploads: result.artifacts.length,
  });

  return result;
}
