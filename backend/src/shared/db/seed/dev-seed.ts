/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * Seeds the System Global reference library (tenant_id NULL) from system-library.json.
 *
 * Idempotent: safe to run on every start. A row counts as present when a System row of
 * the same kind has the same key (code, or name for certificate definitions),
 * case-insensitively. Present rows are never updated.
 *
 * IMPORTANT:
 * - Only ever writes System rows. Tenant rows are untouched.
 * - The JSON is validated with the same zod schemas the HTTP create endpoints use.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';

import type { Logger } from '../../logger/logger';
import type { AppUnitOfWork } from '../../../modules/_shared/persistence/repos';
import type { ReferenceRepo } from '../../../modules/references/dal/reference.repo';
import {
  createCertificateDefinitionSchema,
  createCertificationSchema,
  createMaterialDefinitionSchema,
  createMaterialSchema,
} from '../../../modules/references/reference.schemas';

export const systemLibrarySchema = z.object({
  materials: z.array(createMaterialSchema).default([]),
  certifications: z.array(createCertificationSchema).default([]),
  certificateDefinitions: z.array(createCertificateDefinitionSchema).default([]),
  materialDefinitions: z.array(createMaterialDefinitionSchema).default([]),
});

export type SystemLibrary = z.infer<typeof systemLibrarySchema>;

export type SeedCounts = { created: number; existing: number };

export type DevSeedSummary = Record<keyof SystemLibrary, SeedCounts>;

const SYSTEM_LIBRARY_FILE = new URL('./system-library.json', import.meta.url);

export function loadSystemLibrary(file: URL = SYSTEM_LIBRARY_FILE): SystemLibrary {
  const raw: unknown = JSON.parse(readFileSync(file, 'utf8'));
  return systemLibrarySchema.parse(raw);
}

async function seedKind<TFields extends Record<TKey, string>, TKey extends string>(
  repo: ReferenceRepo<TFields, string>,
  items: readonly TFields[],
  key: TKey,
): Promise<SeedCounts> {
  const present = new Set((await repo.listSystem()).map((row) => row[key].toLowerCase()));
  let created = 0;

  for (const item of items) {
    const value = item[key].toLowerCase();
    if (present.has(value)) continue;

    await repo.insert(null, item);
    present.add(value);
    created += 1;
  }

  return { created, existing: items.length - created };
}

export async function runDevSeed(opts: {
  uow: AppUnitOfWork;
  logger: Logger;
  library?: SystemLibrary;
}): Promise<DevSeedSummary> {
  const flow = 'seed.dev';
  const library = opts.library ?? loadSystemLibrary();

  const summary = await opts.uow.transaction(async (repos) => ({
    materials: await seedKind(repos.materials, library.materials, 'code'),
    certifications: await seedKind(repos.certifications, library.certifications, 'code'),
    certificateDefinitions: await seedKind(
      repos.certificateDefinitions,
      library.certificateDefinitions,
      'name',
    ),
    materialDefinitions: await seedKind(
      repos.materialDefinitions,
      library.materialDefinitions,
      'code',
    ),
  }));

  opts.logger.info({ msg: 'seed.system_library.done', flow, ...summary });
  return summary;
}
