/**
 * backend/src/shared/http/require-auth-context.ts
 *
 * WHY:
 * - Controllers must not duplicate "require session/role" logic.
 * - Centralizes authContext validation to prevent drift across gated pages.
 *
 * RULES:
 * - HTTP-only helper (may depend on Fastify request typing).
 * - Must NOT touch DB, services, or the session store.
 * - Throws AppError so error-handler maps it consistently
 *   (401 → redirect to /login, 403 → Forbidden page).
 */

import type { FastifyRequest } from 'fastify';
import { AppError } from './errors';
import type { UserType } from '../../modules/users/user.types';

export type RequiredAuthContext = Readonly<{
  sessionId: string;
  userId: number;
  userType: UserType;
  remember: boolean;
}>;

export type RequireSessionOptions = Readonly<{
  userType?: UserType;
}>;

/**
 * Controller guard: requires a session, and optionally enforces the user type.
 *
 * Guard sequence:
 * 1) no session -> 401 "Authentication required"
 * 2) wrong user type -> 403 "This page is reserved for <type>s."
 */
export function requireSession(
  req: FastifyRequest,
  opts: RequireSessionOptions = {},
): RequiredAuthContext {
  const session = getOptionalSession(req);
  if (!session) throw AppError.unauthorized('Authentication required');

  if (opts.userType && session.userType !== opts.userType) {
    throw AppError.forbidden(`This page is reserved for ${opts.userType}s.`, {
      required: opts.userType,
      actual: session.userType,
    });
  }

  return session;
}

/** Same checks as requireSession() without the throw; used by public pages. */
export function getOptionalSession(req: FastifyRequest): RequiredAuthContext | null {
  const ctx = req.authContext;
  if (!ctx || !ctx.sessionId || ctx.userId === null || !ctx.userType) return null;

  return {
    sessionId: ctx.sessionId,
    userId: ctx.userId,
    userType: ctx.userType,
    remember: ctx.remember,
  };
}
