/**
 * src/shared/storage/file-store.ts
 *
 * WHY:
 * - Supplier certificate uploads need a stable, retrievable URL.
 * - Services depend on this port; where bytes actually live is a DI decision.
 *
 * RULES:
 * - save() never interprets the bytes; contentType is recorded as given.
 * - Returned URLs are stable for the lifetime of the file.
 * - delete() of an unknown key is a no-op.
 */

export type SaveFileInput = {
  /** Tenant that owns the file (used to namespace storage keys). */
  tenantId: string;
  fileName: string;
  contentType: string;
  bytes: Buffer;
};

export type StoredFile = {
  key: string;
  url: string;
  sizeBytes: number;
};

export interface FileStore {
  save(input: SaveFileInput): Promise<StoredFile>;
  delete(key: string): Promise<void>;
}

/**
 * Storage key: <tenantId>/<uuid>-<sanitized file name>.
 * Keeps the original name readable while preventing path traversal.
 */
export function buildStorageKey(tenantId: string, uniqueId: string, fileName: string): string {
  const base = fileName.split(/[\\/]/).pop() ?? '';
  const safe = base.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '');
  return `${tenantId}/${uniqueId}-${safe || 'file'}`;
}
