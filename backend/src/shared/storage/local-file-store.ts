/**
 * src/shared/storage/local-file-store.ts
 *
 * WHY:
 * - Development/single-node FileStore: writes under UPLOADS_DIR, serves from UPLOADS_PUBLIC_URL.
 * - An object-storage adapter can replace it in di.ts without touching services.
 */

import { mkdir, unlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';

import type { FileStore, SaveFileInput, StoredFile } from './file-store';
import { buildStorageKey } from './file-store';

export class LocalFileStore implements FileStore {
  constructor(
    private readonly opts: {
      rootDir: string;
      publicBaseUrl: string;
    },
  ) {}

  async save(input: SaveFileInput): Promise<StoredFile> {
    const key = buildStorageKey(input.tenantId, randomUUID(), input.fileName);
    const fullPath = path.join(this.opts.rootDir, key);

    await mkdir(path.dirname(fullPath), { recursive: true });
    await writeFile(fullPath, input.bytes);

    return {
      key,
      url: `${this.opts.publicBaseUrl.replace(/\/+$/, '')}/${key}`,
      sizeBytes: input.bytes.byteLength,
    };
  }

  async delete(key: string): Promise<void> {
    try {
      await unlink(path.join(this.opts.rootDir, key));
    } catch (err: unknown) {
      // already gone
      if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    }
  }
}
