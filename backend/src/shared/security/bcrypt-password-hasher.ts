/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * Bcrypt-backed PasswordHasher. Cost comes from config (BCRYPT_COST).
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

export const DEFAULT_BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  private readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? DEFAULT_BCRYPT_COST;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
