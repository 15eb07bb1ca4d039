/**
 * backend/src/modules/users/dal/user.repo.ts
 *
 * WHY:
 * - DAL WRITES ONLY for users (mutations).
 * - Users are only ever inserted; there is no update or delete path.
 *
 * RULES:
 * - No transactions started here.
 * - No AppError: a duplicate email surfaces as ConstraintViolationError and the
 *   service decides what that means for the caller.
 */

import type { DbExecutor } from '../../../shared/db/db';
import { ConstraintViolationError, isUniqueViolation } from '../../../shared/db/db-errors';
import type { UserId, UserType } from '../user.types';

export type InsertUserParams = {
  email: string;
  passwordHash: string;
  lastName: string;
  firstName: string;
  userType: UserType;
  createdAt: Date;
};

export class UserRepo {
  constructor(private readonly db: DbExecutor) {}

  /**
   * Creates a new user. Email uniqueness is enforced by the DB unique index;
   * a losing concurrent insert throws ConstraintViolationError('user.email').
   */
  async insertUser(params: InsertUserParams): Promise<{ id: UserId }> {
    try {
      const row = await this.db
        .insertInto('user')
        .values({
          email: params.email,
          password_hash: params.passwordHash,
          last_name: params.lastName,
          first_name: params.firstName,
          user_type: params.userType,
          created_at: params.createdAt.toISOString(),
        })
        .returning('id')
        .executeTakeFirstOrThrow();

      return { id: row.id };
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConstraintViolationError('user.email', { cause: err });
      }
      throw err;
    }
  }
}
