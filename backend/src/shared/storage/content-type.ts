/**
 * src/shared/storage/content-type.ts
 *
 * WHY:
 * - Certificate entries lose their original content type across a full-replace save,
 *   so the type is re-derived every time with one fixed fallback order:
 *     declared MIME → extension guess → application/octet-stream
 *
 * RULES:
 * - Pure functions only.
 * - The declared type wins whenever it is a well-formed type/subtype.
 */

export const OCTET_STREAM = 'application/octet-stream';

const EXTENSION_TYPES: Readonly<Record<string, string>> = {
  pdf: 'application/pdf',
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  txt: 'text/plain',
  csv: 'text/csv',
  json: 'application/json',
  xml: 'application/xml',
  doc: 'application/msword',
  docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  xls: 'application/vnd.ms-excel',
  xlsx: 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet',
  zip: 'application/zip',
};

const MIME_PATTERN = /^[a-z0-9][a-z0-9!#$&^_.+-]*\/[a-z0-9][a-z0-9!#$&^_.+-]*$/;

/**
 * Guesses a content type from a file name or URL. Query strings and fragments are ignored.
 */
export function guessContentType(nameOrUrl: string): string | null {
  const withoutQuery = nameOrUrl.split(/[?#]/)[0] ?? '';
  const lastSegment = withoutQuery.split('/').pop() ?? '';
  const dot = lastSegment.lastIndexOf('.');
  if (dot === -1 || dot === lastSegment.length - 1) return null;

  const ext = lastSegment.slice(dot + 1).toLowerCase();
  return EXTENSION_TYPES[ext] ?? null;
}

function normalizeDeclared(declared: string | null | undefined): string | null {
  if (!declared) return null;
  const mime = declared.split(';')[0]?.trim().toLowerCase() ?? '';
  return MIME_PATTERN.test(mime) ? mime : null;
}

/** Content type for a freshly uploaded file. */
export function resolveUploadContentType(params: {
  declared: string | null | undefined;
  fileName: string;
}): string {
  return normalizeDeclared(params.declared) ?? guessContentType(params.fileName) ?? OCTET_STREAM;
}

/** Content type for a file referenced by URL (original type not preserved). */
export function resolveUrlContentType(fileUrl: string): string {
  return guessContentType(fileUrl) ?? OCTET_STREAM;
}
