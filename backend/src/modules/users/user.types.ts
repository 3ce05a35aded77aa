/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module.
 * - Users are global identities (not tenant-scoped).
 * - One email = one user across all tenants.
 *
 * RULES:
 * - Email is stored lowercased.
 * - passwordHash never leaves the auth module (see PublicUser).
 */

export type UserId = string;

export type User = {
  id: UserId;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  isActive: boolean;

  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
};

export type PublicUser = Pick<User, 'id' | 'email' | 'firstName' | 'lastName'>;

export function toPublicUser(user: User): PublicUser {
  return { id: user.id, email: user.email, firstName: user.firstName, lastName: user.lastName };
}
