/**
 * Creates the `user` table (credential store).
 */

import { sql } from 'kysely';
import type { Kysely } from 'kysely';
import type { Migration } from 'kysely/migration';

export const createUserTableMigration: Migration = {
  async up(db: Kysely<unknown>): Promise<void> {
    await db.schema
      .createTable('user')
      .addColumn('id', 'serial', (col) => col.primaryKey())
      .addColumn('email', 'varchar(120)', (col) => col.notNull().unique())
      .addColumn('password_hash', 'varchar(128)', (col) => col.notNull())
      .addColumn('last_name', 'varchar(100)', (col) => col.notNull())
      .addColumn('first_name', 'varchar(100)', (col) => col.notNull())
      .addColumn('user_type', 'varchar(16)', (col) => col.notNull())
      .addColumn('created_at', 'timestamptz', (col) => col.notNull().defaultTo(sql`now()`))
      .addCheckConstraint('user_user_type_check', sql`user_type in ('student', 'teacher')`)
      .execute();
  },

  async down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('user').ifExists().execute();
  },
};
