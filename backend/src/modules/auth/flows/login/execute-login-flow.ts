/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Login is where account enumeration would leak, so the failure paths live together.
 *
 * ANTI-ENUMERATION:
 * - Unknown email and wrong password throw the same AuthErrors.invalidCredentials().
 * - Unknown email still pays for one bcrypt compare (against a dummy hash of the same
 *   cost), so both failures take comparable time.
 * - The failure reason is logged server-side only.
 * - A password longer than bcrypt's 72-byte input never matches: registration refuses
 *   such passwords, and comparing it would only check its first 72 bytes.
 *
 * RULES:
 * - No HTTP concerns here (controller sets the cookie).
 * - No raw SQL here (use queries).
 * - No stored data changes; session creation is the only side effect.
 */

import type { DbExecutor } from '../../../../shared/db/db';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';
import type { SessionStore } from '../../../../shared/session/session.store';

import { getUserCredentialsByEmail } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { loginSchema, toFieldErrors } from '../../auth.schemas';
import type { LoginParams, LoginResult } from '../../auth.types';
import { createAuthSession } from '../../helpers/create-auth-session';
import { emailDomain } from '../../helpers/email-domain';
import { passwordFitsHasher } from '../../helpers/password-bytes';
import { landingPathFor } from '../../policies/role-landing.policy';

export async function executeLoginFlow(
  deps: {
    db: DbExecutor;
    passwordHasher: PasswordHasher;
    sessionStore: SessionStore;
    logger: Logger;
    dummyPasswordHash: () => Promise<string>;
  },
  params: LoginParams,
): Promise<LoginResult> {
  const flow = 'auth.login';

  const parsed = loginSchema.safeParse(params);
  if (!parsed.success) {
    throw AuthErrors.invalidInput(toFieldErrors(parsed.error));
  }

  const { email, password, remember } = parsed.data;

  deps.logger.info('auth.login.start', {
    flow,
    requestId: params.requestId,
    emailDomain: emailDomain(email),
  });

  const credentials = await getUserCredentialsByEmail(deps.db, email);

  if (!credentials) {
    await deps.passwordHasher.verify(password, await deps.dummyPasswordHash());

    deps.logger.info('auth.login.failed', {
      flow,
      requestId: params.requestId,
      reason: 'user_not_found',
    });
    throw AuthErrors.invalidCredentials();
  }

  if (!passwordFitsHasher(password)) {
    await deps.passwordHasher.verify(password, await deps.dummyPasswordHash());

    deps.logger.info('auth.login.failed', {
      flow,
      requestId: params.requestId,
      userId: credentials.user.id,
      reason: 'password_too_long',
    });
    throw AuthErrors.invalidCredentials();
  }

  const passwordValid = await deps.passwordHasher.verify(password, credentials.passwordHash);
  if (!passwordValid) {
    deps.logger.info('auth.login.failed', {
      flow,
      requestId: params.requestId,
      userId: credentials.user.id,
      reason: 'wrong_password',
    });
    throw AuthErrors.invalidCredentials();
  }

  const { user } = credentials;

  const session = await createAuthSession({
    sessionStore: deps.sessionStore,
    user,
    remember,
    now: new Date(),
  });

  deps.logger.info('auth.login.success', {
    flow,
    requestId: params.requestId,
    userId: user.id,
    userType: user.userType,
    remember,
    ttlSeconds: session.ttlSeconds,
  });

  return {
    sessionId: session.sessionId,
    user,
    remember,
    cookieMaxAgeSeconds: session.cookieMaxAgeSeconds,
    landingPath: landingPathFor(user.userType),
  };
}
