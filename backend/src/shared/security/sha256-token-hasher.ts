/**
 * backend/src/shared/security/sha256-token-hasher.ts
 *
 * Concrete TokenHasher: hex-encoded SHA-256. Deterministic, so a presented token can
 * be looked up by its hash.
 */

import { createHash } from 'node:crypto';
import type { TokenHasher } from './token-hasher';

export class Sha256TokenHasher implements TokenHasher {
  hash(rawToken: string): string {
    return createHash('sha256').update(rawToken, 'utf8').digest('hex');
  }
}
