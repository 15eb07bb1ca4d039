/**
 * backend/src/modules/users/user.module.ts
 *
 * WHY:
 * - Encapsulates Users module wiring.
 * - Users is a support module (no routes of its own); auth and pages consume it.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { DbExecutor } from '../../shared/db/db';
import { UserRepo } from './dal/user.repo';

export type UserModule = ReturnType<typeof createUserModule>;

export function createUserModule(deps: { db: DbExecutor }) {
  const userRepo = new UserRepo(deps.db);

  return {
    userRepo,
  };
}
