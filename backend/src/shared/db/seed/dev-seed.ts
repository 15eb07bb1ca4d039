/**
 * backend/src/shared/db/seed/dev-seed.ts
 *
 * DEV-ONLY seed bootstrap: one teacher and one student to click around with.
 *
 * Idempotent: an account that already exists is skipped, so it is safe to run on
 * every start (SEED_ON_START=true) or from the maintenance CLI (`seed`).
 *
 * IMPORTANT:
 * - Accounts go through AuthService.register, the same validation + hashing path as
 *   the HTTP form. Nothing is inserted behind the service's back.
 */

import { AppError } from '../../http/errors';
import { logger } from '../../logger/logger';
import type { AuthService } from '../../../modules/auth/auth.service';
import type { UserType } from '../../../modules/users/user.types';

export type SeedUser = Readonly<{
  email: string;
  password: string;
  lastName: string;
  firstName: string;
  userType: UserType;
}>;

export const DEV_SEED_USERS: readonly SeedUser[] = [
  {
    email: 'teacher@example.com',
    password: 'teacher123',
    lastName: 'Martin',
    firstName: 'Claire',
    userType: 'teacher',
  },
  {
    email: 'student@example.com',
    password: 'student123',
    lastName: 'Durand',
    firstName: 'Hugo',
    userType: 'student',
  },
];

export type DevSeedReport = {
  created: string[];
  skipped: string[];
};

export async function runDevSeed(opts: {
  authService: AuthService;
  users?: readonly SeedUser[];
}): Promise<DevSeedReport> {
  const flow = 'seed.dev';
  const report: DevSeedReport = { created: [], skipped: [] };

  for (const user of opts.users ?? DEV_SEED_USERS) {
    try {
      await opts.authService.register({ ...user, requestId: null });
      report.created.push(user.email);
      logger.info('seed.user_created', { flow, email: user.email, userType: user.userType });
    } catch (err) {
      if (err instanceof AppError && err.code === 'CONFLICT') {
        report.skipped.push(user.email);
        logger.info('seed.user_exists', { flow, email: user.email });
        continue;
      }
      throw err;
    }
  }

  return report;
}
