/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Single entry point for register / login / logout, used by the HTTP controller
 *   and by the maintenance CLI's seed command.
 * - Orchestration lives in flows/; the service wires dependencies and owns the
 *   dummy hash used for login timing parity.
 *
 * RULES:
 * - No HTTP concerns (no reply, no cookies).
 * - Throws AppError (via AuthErrors) for every user-facing failure.
 */

import { randomUUID } from 'node:crypto';

import type { DbExecutor } from '../../shared/db/db';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from '../../shared/session/session.store';
import type { UserRepo } from '../users';

import type {
  LoginParams,
  LoginResult,
  LogoutParams,
  RegisterParams,
  RegisterResult,
} from './auth.types';
import { executeRegisterFlow } from './flows/register/execute-register-flow';
import { executeLoginFlow } from './flows/login/execute-login-flow';

export class AuthService {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private readonly deps: {
      db: DbExecutor;
      passwordHasher: PasswordHasher;
      logger: Logger;
      sessionStore: SessionStore;
      userRepo: UserRepo;
    },
  ) {}

  /**
   * Computes the dummy hash up front so the first unknown-email login is not slower
   * than later ones. Safe to call more than once.
   */
  async warmUp(): Promise<void> {
    await this.dummyPasswordHash();
  }

  private dummyPasswordHash(): Promise<string> {
    if (!this.dummyHash) {
      const pending = this.deps.passwordHasher.hash(randomUUID());
      // A failed attempt must not poison later logins.
      pending.catch(() => {
        this.dummyHash = null;
      });
      this.dummyHash = pending;
    }
    return this.dummyHash;
  }

  async register(params: RegisterParams): Promise<RegisterResult> {
    return executeRegisterFlow(
      {
        db: this.deps.db,
        passwordHasher: this.deps.passwordHasher,
        userRepo: this.deps.userRepo,
        logger: this.deps.logger,
      },
      params,
    );
  }

  async login(params: LoginParams): Promise<LoginResult> {
    return executeLoginFlow(
      {
        db: this.deps.db,
        passwordHasher: this.deps.passwordHasher,
        sessionStore: this.deps.sessionStore,
        logger: this.deps.logger,
        dummyPasswordHash: () => this.dummyPasswordHash(),
      },
      params,
    );
  }

  /** Idempotent: no session, or an already-destroyed one, is not an error. */
  async logout(params: LogoutParams): Promise<void> {
    if (params.sessionId) {
      await this.deps.sessionStore.destroy(params.sessionId);
    }

    this.deps.logger.info('auth.logout', {
      flow: 'auth.logout',
      requestId: params.requestId,
      userId: params.userId,
      hadSession: params.sessionId !== null,
    });
  }
}
