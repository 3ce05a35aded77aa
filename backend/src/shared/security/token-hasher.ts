/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Raw invitation tokens never reach the database; only their hash does.
 *   A leaked connections table therefore yields no usable invitation links.
 *
 * NOTE:
 * - Interface so services depend on an abstraction (DIP).
 */

export interface TokenHasher {
  hash(rawToken: string): string;
}
