/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - Persistence port for users + its Kysely implementation.
 * - Users are global identities: reads and writes are NOT tenant-scoped.
 *
 * RULES:
 * - No transactions started here (UnitOfWork owns tx).
 * - No AppError.
 * - No policies.
 * - Callers pass lowercased emails.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UsersTable } from '../../../shared/db/tables';
import type { NewUser, User } from '../user.types';

type UserRow = Selectable<UsersTable>;

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    firstName: row.first_name,
    lastName: row.last_name,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export interface UserRepo {
  findById(id: string): Promise<User | undefined>;
  findByEmail(email: string): Promise<User | undefined>;
  insert(input: NewUser): Promise<User>;
}

export class SqlUserRepo implements UserRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(id: string): Promise<User | undefined> {
    const row = await this.db.selectFrom('users').selectAll().where('id', '=', id).executeTakeFirst();
    return row ? toUser(row) : undefined;
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const row = await this.db
      .selectFrom('users')
      .selectAll()
      .where('email', '=', email)
      .executeTakeFirst();
    return row ? toUser(row) : undefined;
  }

  async insert(input: NewUser): Promise<User> {
    const row = await this.db
      .insertInto('users')
      .values({
        email: input.email,
        password_hash: input.passwordHash,
        first_name: input.firstName,
        last_name: input.lastName,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toUser(row);
  }
}
