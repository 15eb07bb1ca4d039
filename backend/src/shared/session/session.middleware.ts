/**
 * backend/src/shared/session/session.middleware.ts
 *
 * WHY:
 * - Reads the signed session cookie on every request.
 * - If a valid session exists, populates req.authContext (userId, userType).
 * - Does NOT throw if no session; endpoints decide whether auth is required.
 *
 * RULES:
 * - Runs AFTER requestContext and authContext hooks (needs both to exist).
 * - Best-effort: missing/unsigned/expired cookie → authContext stays anonymous.
 * - Expiry is evaluated here, lazily, on each request (no background sweep).
 * - No business logic (just session → authContext mapping).
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { SessionStore } from './session.store';
import { SESSION_COOKIE_NAME } from './session.types';
import type { KeyedHasher } from '../security/keyed-hasher';
import { parseCookies } from '../http/cookies';
import { unsignSessionId } from './set-session-cookie';

export function registerSessionMiddleware(
  app: FastifyInstance,
  deps: { sessionStore: SessionStore; signer: KeyedHasher },
): void {
  app.addHook('onRequest', async (req: FastifyRequest) => {
    const raw = parseCookies(req.headers.cookie)[SESSION_COOKIE_NAME];
    if (!raw) return;

    const sessionId = unsignSessionId(deps.signer, raw);
    if (!sessionId) return;

    const session = await deps.sessionStore.get(sessionId);
    if (!session) return;

    await deps.sessionStore.touch(sessionId, session);

    req.authContext = {
      sessionId,
      userId: session.userId,
      userType: session.userType,
      remember: session.remember,
    };
  });
}
