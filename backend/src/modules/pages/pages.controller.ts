/**
 * src/modules/pages/pages.controller.ts
 *
 * WHY:
 * - The landing page and the two role-gated pages.
 * - Gate order: session present (else 401 → redirect /login), then user type matches
 *   the page (else 403 Forbidden page), then the user still exists in the store.
 *
 * RULES:
 * - Reads users, never writes them.
 * - A session whose user vanished (store reset) is destroyed and treated as no session.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';

import type { DbExecutor } from '../../shared/db/db';
import { AppError } from '../../shared/http/errors';
import { consumeFlash } from '../../shared/http/flash';
import { getOptionalSession, requireSession } from '../../shared/http/require-auth-context';
import type { RequiredAuthContext } from '../../shared/http/require-auth-context';
import { withRequestContext } from '../../shared/logger/with-context';
import type { SessionStore } from '../../shared/session/session.store';
import { clearSessionCookie } from '../../shared/session/set-session-cookie';
import type { ViewUser } from '../../shared/views/layout';

import { getUserById } from '../users';
import type { User } from '../users';
import { landingPathFor } from '../auth/policies/role-landing.policy';

import { renderHomePage } from './views/home.view';
import { renderStudentsPage, renderTeachersPage } from './views/role-page.view';

const HTML = 'text/html; charset=utf-8';

export function toViewUser(user: User): ViewUser {
  return {
    firstName: user.firstName,
    lastName: user.lastName,
    userType: user.userType,
    landingPath: landingPathFor(user.userType),
  };
}

export class PagesController {
  constructor(
    private readonly deps: {
      db: DbExecutor;
      sessionStore: SessionStore;
      isProduction: boolean;
    },
  ) {}

  /** Loads the session's user, or drops a session that points at a missing user. */
  private async loadSessionUser(
    req: FastifyRequest,
    reply: FastifyReply,
    session: RequiredAuthContext,
  ): Promise<User | null> {
    const user = await getUserById(this.deps.db, session.userId);
    if (user) return user;

    withRequestContext(req).warn('session.orphaned', { flow: 'pages.gate' });
    await this.deps.sessionStore.destroy(session.sessionId);
    clearSessionCookie(reply, this.deps.isProduction);
    return null;
  }

  async home(req: FastifyRequest, reply: FastifyReply) {
    const session = getOptionalSession(req);
    const user = session ? await this.loadSessionUser(req, reply, session) : null;

    const flash = consumeFlash(req, reply, this.deps.isProduction);
    return reply
      .type(HTML)
      .send(renderHomePage({ currentUser: user ? toViewUser(user) : null, flash }));
  }

  async teachers(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { userType: 'teacher' });

    const user = await this.loadSessionUser(req, reply, session);
    if (!user) throw AppError.unauthorized('Authentication required');

    const flash = consumeFlash(req, reply, this.deps.isProduction);
    return reply.type(HTML).send(renderTeachersPage({ currentUser: toViewUser(user), flash }));
  }

  async students(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { userType: 'student' });

    const user = await this.loadSessionUser(req, reply, session);
    if (!user) throw AppError.unauthorized('Authentication required');

    const flash = consumeFlash(req, reply, this.deps.isProduction);
    return reply.type(HTML).send(renderStudentsPage({ currentUser: toViewUser(user), flash }));
  }
}
