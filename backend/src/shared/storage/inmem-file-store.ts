/**
 * src/shared/storage/inmem-file-store.ts
 *
 * WHY:
 * - Tests need to assert on uploaded bytes without touching the filesystem.
 *
 * HOW TO USE:
 * - const store = new InMemFileStore('memory://uploads')
 * - store.get(url) → the saved file (or undefined)
 */

import { randomUUID } from 'node:crypto';
import type { FileStore, SaveFileInput, StoredFile } from './file-store';
import { buildStorageKey } from './file-store';

type SavedFile = SaveFileInput & StoredFile;

export class InMemFileStore implements FileStore {
  private readonly files = new Map<string, SavedFile>();

  constructor(private readonly baseUrl: string = 'memory://uploads') {}

  save(input: SaveFileInput): Promise<StoredFile> {
    const key = buildStorageKey(input.tenantId, randomUUID(), input.fileName);
    const stored: StoredFile = {
      key,
      url: `${this.baseUrl}/${key}`,
      sizeBytes: input.bytes.byteLength,
    };

    this.files.set(stored.url, { ...input, ...stored });
    return Promise.resolve(stored);
  }

  delete(key: string): Promise<void> {
    this.files.delete(`${this.baseUrl}/${key}`);
    return Promise.resolve();
  }

  get(url: string): SavedFile | undefined {
    return this.files.get(url);
  }

  count(): number {
    return this.files.size;
  }
}
