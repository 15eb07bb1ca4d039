/**
 * backend/src/modules/users/dal/user.query-sql.ts
 *
 * WHY:
 * - DAL READS ONLY for users (raw Kysely access).
 *
 * RULES:
 * - No AppError.
 * - No policies.
 * - Callers pass emails already normalized (trimmed + lower-cased); lookups are exact.
 */

import type { Selectable } from 'kysely';
import type { DbExecutor } from '../../../shared/db/db';
import type { UserTable } from '../../../shared/db/db.types';

export type UserRow = Selectable<UserTable>;

export async function selectUserByEmailSql(
  db: DbExecutor,
  email: string,
): Promise<UserRow | undefined> {
  return db.selectFrom('user').selectAll().where('email', '=', email).executeTakeFirst();
}

export async function selectUserByIdSql(
  db: DbExecutor,
  userId: number,
): Promise<UserRow | undefined> {
  return db.selectFrom('user').selectAll().where('id', '=', userId).executeTakeFirst();
}

export async function selectUsersSql(db: DbExecutor): Promise<UserRow[]> {
  return db.selectFrom('user').selectAll().orderBy('id').execute();
}

export async function countUsersByTypeSql(
  db: DbExecutor,
): Promise<Array<{ user_type: string; count: string | number | bigint }>> {
  return db
    .selectFrom('user')
    .select(['user_type', db.fn.countAll<string | number | bigint>().as('count')])
    .groupBy('user_type')
    .execute();
}
