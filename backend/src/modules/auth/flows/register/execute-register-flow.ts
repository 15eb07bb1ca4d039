/**
 * backend/src/modules/auth/flows/register/execute-register-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Keeps AuthService thin while isolating orchestration.
 *
 * SEQUENCE:
 * 1) validate + normalize (trim, lower-case email)
 * 2) reject a known email early (cheap, avoids a wasted bcrypt hash)
 * 3) hash password
 * 4) insert; a unique-index violation from a concurrent registration maps to the
 *    same DuplicateEmail error as step 2
 *
 * RULES:
 * - No HTTP concerns here (controller handles that).
 * - No raw SQL here (use queries/repos).
 */

import type { DbExecutor } from '../../../../shared/db/db';
import { ConstraintViolationError } from '../../../../shared/db/db-errors';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { Logger } from '../../../../shared/logger/logger';

import { getUserByEmail } from '../../../users';
import type { UserRepo } from '../../../users';

import { AuthErrors } from '../../auth.errors';
import { registerSchema, toFieldErrors } from '../../auth.schemas';
import type { RegisterParams, RegisterResult } from '../../auth.types';
import { emailDomain } from '../../helpers/email-domain';

export async function executeRegisterFlow(
  deps: {
    db: DbExecutor;
    passwordHasher: PasswordHasher;
    userRepo: UserRepo;
    logger: Logger;
  },
  params: RegisterParams,
): Promise<RegisterResult> {
  const flow = 'auth.register';

  const parsed = registerSchema.safeParse(params);
  if (!parsed.success) {
    const fieldErrors = toFieldErrors(parsed.error);
    deps.logger.info('auth.register.invalid_input', {
      flow,
      requestId: params.requestId,
      fields: Object.keys(fieldErrors),
    });
    throw AuthErrors.invalidInput(fieldErrors);
  }

  const input = parsed.data;

  deps.logger.info('auth.register.start', {
    flow,
    requestId: params.requestId,
    emailDomain: emailDomain(input.email),
    userType: input.userType,
  });

  const existing = await getUserByEmail(deps.db, input.email);
  if (existing) {
    deps.logger.info('auth.register.duplicate', {
      flow,
      requestId: params.requestId,
      reason: 'email_exists',
    });
    throw AuthErrors.duplicateEmail({ reason: 'email_exists' });
  }

  const passwordHash = await deps.passwordHasher.hash(input.password);

  let userId: number;
  try {
    const created = await deps.userRepo.insertUser({
      email: input.email,
      passwordHash,
      lastName: input.lastName,
      firstName: input.firstName,
      userType: input.userType,
      createdAt: new Date(),
    });
    userId = created.id;
  } catch (err) {
    if (err instanceof ConstraintViolationError) {
      deps.logger.info('auth.register.duplicate', {
        flow,
        requestId: params.requestId,
        reason: 'constraint_violation',
      });
      throw AuthErrors.duplicateEmail({ reason: 'constraint_violation' });
    }
    throw err;
  }

  deps.logger.info('auth.register.success', {
    flow,
    requestId: params.requestId,
    userId,
    userType: input.userType,
  });

  return { userId };
}
