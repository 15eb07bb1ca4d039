/**
 * backend/src/shared/db/migrate.ts
 *
 * WHY:
 * - One code path applies migrations for the server boot, the maintenance CLI and tests.
 * - Migrations are imported statically (no directory scan), so they work the same
 *   under tsx, vitest and a compiled build.
 *
 * HOW TO USE:
 * - await migrateToLatest(db)
 * - await migrateToEmpty(db)   // maintenance `reset` only
 */

import { Migrator, NO_MIGRATIONS } from 'kysely/migration';
import type { MigrationProvider, MigrationResultSet } from 'kysely/migration';

import type { Db } from './db';
import { migrations } from './migrations';
import { logger } from '../logger/logger';

class StaticMigrationProvider implements MigrationProvider {
  getMigrations() {
    return Promise.resolve(migrations);
  }
}

function createMigrator(db: Db): Migrator {
  return new Migrator({ db, provider: new StaticMigrationProvider() });
}

function reportResults(flow: string, resultSet: MigrationResultSet): void {
  resultSet.results?.forEach((r) => {
    if (r.status === 'Success') {
      logger.info('db.migration.success', {
        flow,
        migration: r.migrationName,
        direction: r.direction,
      });
    }
    if (r.status === 'Error') {
      logger.error('db.migration.error', { flow, migration: r.migrationName });
    }
  });

  if (resultSet.error) {
    throw new Error(`${flow} failed`, { cause: resultSet.error });
  }
}

export async function migrateToLatest(db: Db): Promise<void> {
  const resultSet = await createMigrator(db).migrateToLatest();
  reportResults('db.migrate', resultSet);
}

export async function migrateToEmpty(db: Db): Promise<void> {
  const resultSet = await createMigrator(db).migrateTo(NO_MIGRATIONS);
  reportResults('db.migrate_down', resultSet);
}
