/**
 * Ordered migration list. Names sort lexically; add new entries at the end.
 */

import type { Migration } from 'kysely/migration';
import { createUserTableMigration } from './0001_user';

export const migrations: Record<string, Migration> = {
  '0001_user': createUserTableMigration,
};
