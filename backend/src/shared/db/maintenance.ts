/**
 * backend/src/shared/db/maintenance.ts
 *
 * WHY:
 * - Operations behind the maintenance CLI (manage.ts), kept importable so they can
 *   be tested against an in-memory database.
 * - Every operation goes through the same migrator, queries and AuthService the
 *   server uses; there is no second copy of the schema or of the validation rules.
 */

import type { Db } from './db';
import { migrateToEmpty, migrateToLatest } from './migrate';
import { runDevSeed, type DevSeedReport } from './seed/dev-seed';
import { countUsersByType, listUsers } from '../../modules/users';
import type { User, UserType } from '../../modules/users';
import type { AuthService } from '../../modules/auth/auth.service';

export type StoreInfo = {
  total: number;
  byType: Record<UserType, number>;
  users: User[];
};

export async function initStore(db: Db): Promise<void> {
  await migrateToLatest(db);
}

export async function seedStore(authService: AuthService): Promise<DevSeedReport> {
  return runDevSeed({ authService });
}

export async function describeStore(db: Db): Promise<StoreInfo> {
  const byType = await countUsersByType(db);
  const users = await listUsers(db);

  return {
    total: byType.student + byType.teacher,
    byType,
    users,
  };
}

/** Drops every table, recreates the schema, then re-seeds the test accounts. */
export async function resetStore(
  db: Db,
  authService: AuthService,
): Promise<DevSeedReport> {
  await migrateToEmpty(db);
  await migrateToLatest(db);
  return runDevSeed({ authService });
}

export function formatStoreInfo(info: StoreInfo): string {
  const lines = [
    `users: ${info.total} (teachers: ${info.byType.teacher}, students: ${info.byType.student})`,
  ];

  for (const user of info.users) {
    lines.push(
      `  #${user.id} ${user.email} · ${user.firstName} ${user.lastName} · ${user.userType} · ${user.createdAt.toISOString()}`,
    );
  }

  return lines.join('\n');
}
