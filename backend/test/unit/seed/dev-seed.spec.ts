import { describe, it, expect } from 'vitest';
import { logger } from '../../../src/shared/logger/logger';
import {
  loadSystemLibrary,
  runDevSeed,
  systemLibrarySchema,
} from '../../../src/shared/db/seed/dev-seed';
import { InMemUnitOfWork } from '../../helpers/inmem-persistence';

describe('runDevSeed', () => {
  it('loads a valid system library from disk', () => {
    const library = loadSystemLibrary();
    expect(library.materials.length).toBeGreaterThan(0);
    expect(library.certificateDefinitions.length).toBeGreaterThan(0);
  });

  it('creates every system row once and is idempotent', async () => {
    const uow = new InMemUnitOfWork();
    const library = loadSystemLibrary();

    const first = await runDevSeed({ uow, logger, library });
    expect(first.materials).toEqual({ created: library.materials.length, existing: 0 });

    const second = await runDevSeed({ uow, logger, library });
    expect(second.materials).toEqual({ created: 0, existing: library.materials.length });
    expect(second.certificateDefinitions.created).toBe(0);

    expect(uow.db.tables.materials).toHaveLength(library.materials.length);
    expect(uow.db.tables.materials.every((m) => m.tenantId === null)).toBe(true);
  });

  it('matches keys case-insensitively and ignores tenant rows', async () => {
    const uow = new InMemUnitOfWork();
    await uow.transaction((repos) =>
      repos.materials.insert('tenant-1', {
        name: 'Hemp',
        code: 'HEMP',
        materialType: null,
        description: null,
      }),
    );

    const library = systemLibrarySchema.parse({
      materials: [
        { name: 'Hemp', code: 'hemp' },
        { name: 'Hemp again', code: 'HEMP' },
      ],
    });

    const summary = await runDevSeed({ uow, logger, library });

    expect(summary.materials).toEqual({ created: 1, existing: 1 });
    expect(summary.certifications).toEqual({ created: 0, existing: 0 });
    expect(uow.db.tables.materials.filter((m) => m.tenantId === null)).toHaveLength(1);
  });
});
