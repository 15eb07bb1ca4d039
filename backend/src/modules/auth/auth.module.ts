/**
 * src/modules/auth/auth.module.ts
 *
 * WHY:
 * - Encapsulates Auth module wiring.
 * - DI creates infra; module composes domain units.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 * - No globals/singletons here.
 */

import type { FastifyInstance } from 'fastify';
import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { KeyedHasher } from '../../shared/security/keyed-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserRepo } from '../users';

import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { registerAuthRoutes } from './auth.routes';

export type AuthModule = ReturnType<typeof createAuthModule>;

export function createAuthModule(deps: {
  db: DbExecutor;
  passwordHasher: PasswordHasher;
  sessionSigner: KeyedHasher;
  logger: Logger;
  sessionStore: SessionStore;
  userRepo: UserRepo;
  isProduction: boolean;
}) {
  const authService = new AuthService({
    db: deps.db,
    passwordHasher: deps.passwordHasher,
    logger: deps.logger,
    sessionStore: deps.sessionStore,
    userRepo: deps.userRepo,
  });

  const controller = new AuthController(authService, {
    isProduction: deps.isProduction,
    sessionSigner: deps.sessionSigner,
  });

  return {
    authService,
    registerRoutes(app: FastifyInstance) {
      registerAuthRoutes(app, controller);
    },
  };
}
