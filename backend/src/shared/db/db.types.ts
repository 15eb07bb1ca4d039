/**
 * backend/src/shared/db/db.types.ts
 *
 * WHY:
 * - Kysely needs a Database interface to type queries.
 * - The schema is one small table, so the interface is written alongside the
 *   migration instead of generated from a live database.
 *
 * RULES:
 * - Keep aligned with migrations/ (column names, nullability).
 * - created_at is timestamptz: read as Date, written as an ISO string (or left to
 *   the column default).
 */

import type { ColumnType, Generated } from 'kysely';

export interface UserTable {
  id: Generated<number>;
  email: string;
  password_hash: string;
  last_name: string;
  first_name: string;
  user_type: string;
  created_at: ColumnType<Date, string | undefined, never>;
}

export interface DB {
  user: UserTable;
}
