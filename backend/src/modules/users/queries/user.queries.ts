/**
 * backend/src/modules/users/queries/user.queries.ts
 *
 * WHY:
 * - Queries are read-only and side-effect free.
 * - They shape DB rows into User domain types (camelCase, Date, narrowed userType).
 *
 * RULES:
 * - Read-only.
 * - No AppError.
 */

import type { DbExecutor } from '../../../shared/db/db';
import {
  countUsersByTypeSql,
  selectUserByEmailSql,
  selectUserByIdSql,
  selectUsersSql,
} from '../dal/user.query-sql';
import type { UserRow } from '../dal/user.query-sql';
import { isUserType } from '../user.types';
import type { User, UserCredentials, UserType } from '../user.types';

function toUser(row: UserRow): User {
  // The CHECK constraint makes this unreachable unless the table was edited by hand.
  if (!isUserType(row.user_type)) {
    throw new Error(`user ${row.id} has unknown user_type "${row.user_type}"`);
  }

  return {
    id: row.id,
    email: row.email,
    lastName: row.last_name,
    firstName: row.first_name,
    userType: row.user_type,
    createdAt: new Date(row.created_at),
  };
}

export async function getUserByEmail(db: DbExecutor, email: string): Promise<User | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return toUser(row);
}

export async function getUserById(db: DbExecutor, userId: number): Promise<User | undefined> {
  const row = await selectUserByIdSql(db, userId);
  if (!row) return undefined;
  return toUser(row);
}

/** Login only: the one read that returns the stored hash. */
export async function getUserCredentialsByEmail(
  db: DbExecutor,
  email: string,
): Promise<UserCredentials | undefined> {
  const row = await selectUserByEmailSql(db, email);
  if (!row) return undefined;
  return { user: toUser(row), passwordHash: row.password_hash };
}

export async function listUsers(db: DbExecutor): Promise<User[]> {
  const rows = await selectUsersSql(db);
  return rows.map(toUser);
}

export async function countUsersByType(db: DbExecutor): Promise<Record<UserType, number>> {
  const counts: Record<UserType, number> = { student: 0, teacher: 0 };

  for (const row of await countUsersByTypeSql(db)) {
    if (isUserType(row.user_type)) counts[row.user_type] = Number(row.count);
  }

  return counts;
}
