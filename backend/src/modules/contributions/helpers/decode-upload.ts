/**
 * src/modules/contributions/helpers/decode-upload.ts
 *
 * RULES:
 * - Pure.
 * - Standard base64 only (whitespace ignored, padding optional). Anything else is null.
 */

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64Strict(data: string): Buffer | null {
  const compact = data.replace(/\s+/g, '');
  if (compact.length === 0 || !BASE64_PATTERN.test(compact)) return null;

  const unpadded = compact.replace(/=+$/, '');
  if (unpadded.length % 4 === 1) return null;

  return Buffer.from(unpadded, 'base64');
}
