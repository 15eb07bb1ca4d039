/**
 * backend/src/shared/db/manage.ts
 *
 * Offline maintenance CLI for the credential store.
 *
 * HOW TO USE:
 * - npm run db:manage -- migrate      # create / upgrade the schema
 * - npm run db:manage -- seed         # add the two test accounts (idempotent)
 * - npm run db:manage -- info         # counts per user type + user list
 * - npm run db:manage -- reset --yes  # drop everything, recreate, re-seed
 *
 * Uses the same config (DATABASE_URL) and the same AuthService as the server.
 */

import { buildConfig } from '../../app/config';
import { createDb } from './db';
import { InMemCache } from '../cache/inmem-cache';
import { SessionStore } from '../session/session.store';
import { BcryptPasswordHasher } from '../security/bcrypt-password-hasher';
import { logger } from '../logger/logger';
import { createUserModule } from '../../modules/users/user.module';
import { AuthService } from '../../modules/auth/auth.service';
import { describeStore, formatStoreInfo, initStore, resetStore, seedStore } from './maintenance';

const USAGE = `usage: manage <command>

commands:
  migrate       apply pending migrations
  seed          register the test teacher + student (skips existing)
  info          show user counts and list users
  reset --yes   drop all data, recreate the schema and re-seed`;

async function main(argv: string[]): Promise<number> {
  const [command, ...rest] = argv;

  if (!command || command === 'help' || command === '--help') {
    console.log(USAGE);
    return command ? 0 : 1;
  }

  const config = buildConfig();
  const handle = createDb(config.databaseUrl);
  const { db } = handle;

  // Sessions are irrelevant offline; the service only needs somewhere to put them.
  const authService = new AuthService({
    db,
    passwordHasher: new BcryptPasswordHasher({ cost: config.bcryptCost }),
    logger,
    sessionStore: new SessionStore(new InMemCache(), config.session),
    userRepo: createUserModule({ db }).userRepo,
  });

  try {
    switch (command) {
      case 'migrate':
        await initStore(db);
        console.log('schema is up to date');
        return 0;

      case 'seed': {
        await initStore(db);
        const report = await seedStore(authService);
        console.log(`created: ${report.created.join(', ') || '-'}`);
        console.log(`skipped: ${report.skipped.join(', ') || '-'}`);
        return 0;
      }

      case 'info':
        await initStore(db);
        console.log(formatStoreInfo(await describeStore(db)));
        return 0;

      case 'reset': {
        if (!rest.includes('--yes')) {
          console.error('reset deletes every user; re-run with --yes to confirm');
          return 1;
        }
        const report = await resetStore(db, authService);
        console.log(`store reset; seeded: ${report.created.join(', ')}`);
        return 0;
      }

      default:
        console.error(`unknown command "${command}"\n\n${USAGE}`);
        return 1;
    }
  } finally {
    await handle.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error('manage.failed', { err });
    process.exitCode = 1;
  });
