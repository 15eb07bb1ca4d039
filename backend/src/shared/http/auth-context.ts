/**
 * backend/src/shared/http/auth-context.ts
 *
 * WHY:
 * - Every request carries an explicit "who is this" value, even when anonymous.
 *
 * HOW IT WORKS:
 * 1. registerAuthContext() sets the anonymous value on every request.
 * 2. Session middleware overwrites it when a valid signed session cookie exists.
 * 3. Controllers read it through requireSession() / getOptionalSession().
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { UserType } from '../../modules/users/user.types';

export type AuthContext = {
  sessionId: string | null;
  userId: number | null;
  userType: UserType | null;
  remember: boolean;
};

declare module 'fastify' {
  interface FastifyRequest {
    authContext: AuthContext;
  }
}

export const ANONYMOUS_AUTH_CONTEXT: Readonly<AuthContext> = Object.freeze({
  sessionId: null,
  userId: null,
  userType: null,
  remember: false,
});

export function registerAuthContext(app: FastifyInstance) {
  app.decorateRequest('authContext', null);

  app.addHook('onRequest', (req: FastifyRequest, _reply, done) => {
    req.authContext = { ...ANONYMOUS_AUTH_CONTEXT };
    done();
  });
}
