/**
 * src/modules/contributions/helpers/check-draft-references.ts
 *
 * WHY:
 * - Draft entries may link reference rows and supplier profiles by id. Those ids come from
 *   the client, so each one is resolved against the acting tenant before anything is written.
 *
 * RULES:
 * - Reference rows: System Global or the acting tenant's own, else NOT_FOUND.
 * - Supplier profiles: the acting tenant's own, else NOT_FOUND.
 * - Runs inside the caller's unit of work, before any write.
 */

import type { Repos } from '../../_shared/persistence/repos';
import { ConnectionErrors } from '../../connections/connection.errors';
import type { ReferenceOwnership } from '../../references/reference.types';
import { assertVisibleToTenant } from '../../references/policies/reference-ownership.policy';
import type { SaveDraftInput } from '../contribution.schemas';

type Lookup = { findById(id: string): Promise<ReferenceOwnership | undefined> };

function distinctIds(values: readonly (string | null | undefined)[]): string[] {
  const ids = new Set<string>();
  for (const value of values) if (value) ids.add(value);
  return [...ids];
}

async function assertAllVisible(
  repo: Lookup,
  ids: readonly (string | null | undefined)[],
  tenantId: string,
  label: string,
): Promise<void> {
  for (const id of distinctIds(ids)) {
    assertVisibleToTenant(await repo.findById(id), tenantId, label, { id });
  }
}

export async function assertDraftReferencesVisible(
  repos: Repos,
  tenantId: string,
  input: SaveDraftInput,
): Promise<void> {
  const materials = input.materials ?? [];
  const certifications = input.certifications ?? [];

  await assertAllVisible(
    repos.materials,
    materials.map((m) => m.materialId),
    tenantId,
    'material',
  );
  await assertAllVisible(
    repos.materialDefinitions,
    materials.map((m) => m.materialDefinitionId),
    tenantId,
    'material definition',
  );
  await assertAllVisible(
    repos.certifications,
    certifications.map((c) => c.certificationId),
    tenantId,
    'certification',
  );
  await assertAllVisible(
    repos.certificateDefinitions,
    certifications.map((c) => c.certificateDefinitionId),
    tenantId,
    'certificate definition',
  );

  for (const profileId of distinctIds((input.suppliers ?? []).map((s) => s.supplierProfileId))) {
    const profile = await repos.supplierProfiles.findById(profileId);
    if (!profile || profile.tenantId !== tenantId) {
      throw ConnectionErrors.profileNotFound({ profileId });
    }
  }
}
