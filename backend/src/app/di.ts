/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for the whole app.
 * - Creates infra clients ONCE (db, cache) and shares them safely.
 * - Keeps modules testable: tests pass fakes through `overrides`.
 *
 * RULES:
 * - No business logic here.
 * - No HTTP logic here.
 * - Environment-dependent decisions (memory vs Redis sessions, cookie Secure flag)
 *   belong HERE, not inside the classes themselves (DIP).
 */

import type { AppConfig } from './config';
import { createDb } from '../shared/db/db';
import type { Db } from '../shared/db/db';

import { InMemCache } from '../shared/cache/inmem-cache';
import { RedisCache } from '../shared/cache/redis-cache';
import type { Cache } from '../shared/cache/cache';

import type { PasswordHasher } from '../shared/security/password-hasher';
import { BcryptPasswordHasher } from '../shared/security/bcrypt-password-hasher';
import { HmacSha256KeyedHasher } from '../shared/security/keyed-hasher';
import type { KeyedHasher } from '../shared/security/keyed-hasher';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { SessionStore } from '../shared/session/session.store';

import { createUserModule } from '../modules/users/user.module';
import type { UserModule } from '../modules/users/user.module';

import { createAuthModule } from '../modules/auth/auth.module';
import type { AuthModule } from '../modules/auth/auth.module';

import { createPagesModule } from '../modules/pages/pages.module';
import type { PagesModule } from '../modules/pages/pages.module';

export type AppDeps = {
  db: Db;
  cache: Cache;

  logger: Logger;

  passwordHasher: PasswordHasher;
  sessionSigner: KeyedHasher;
  sessionStore: SessionStore;

  // modules
  users: UserModule;
  auth: AuthModule;
  pages: PagesModule;

  // lifecycle
  close: () => Promise<void>;
};

export type DepsOverrides = {
  /** Replaces the memory/Redis choice (tests pass an InMemCache with a fake clock). */
  cache?: Cache;
};

async function createCache(config: AppConfig): Promise<Cache> {
  if (config.redisUrl) {
    logger.info('sessions.backend', { flow: 'di', backend: 'redis' });
    return RedisCache.connect(config.redisUrl);
  }

  logger.info('sessions.backend', { flow: 'di', backend: 'memory' });
  return new InMemCache();
}

export async function buildDeps(config: AppConfig, overrides: DepsOverrides = {}): Promise<AppDeps> {
  const dbHandle = createDb(config.databaseUrl);
  const { db } = dbHandle;

  const cache = overrides.cache ?? (await createCache(config));

  const isProduction = config.nodeEnv === 'production';

  const passwordHasher: PasswordHasher = new BcryptPasswordHasher({
    cost: config.bcryptCost,
  });
  const sessionSigner: KeyedHasher = new HmacSha256KeyedHasher(config.session.secret);

  const sessionStore = new SessionStore(cache, {
    ttlSeconds: config.session.ttlSeconds,
    rememberMeTtlSeconds: config.session.rememberMeTtlSeconds,
  });

  // modules (no HTTP / no business logic here)
  const users = createUserModule({ db });

  const auth = createAuthModule({
    db,
    passwordHasher,
    sessionSigner,
    logger,
    sessionStore,
    userRepo: users.userRepo,
    isProduction,
  });

  const pages = createPagesModule({ db, sessionStore, isProduction });

  return {
    db,
    cache,
    logger,
    passwordHasher,
    sessionSigner,
    sessionStore,
    users,
    auth,
    pages,
    close: async () => {
      await cache.close();
      await dbHandle.close();
    },
  };
}
