/**
 * src/modules/auth/helpers/create-auth-session.ts
 *
 * WHY:
 * - Login decides two lifetimes together: the server-side TTL and the cookie Max-Age.
 *   Keeping both here means they cannot disagree.
 *
 * RULES:
 * - No DB access (sessions live in the Cache via SessionStore).
 * - isProduction is NOT needed here; cookie flags are set by the controller.
 */

import type { SessionStore } from '../../../shared/session/session.store';
import type { User } from '../../users/user.types';

export type CreateAuthSessionParams = {
  sessionStore: SessionStore;
  user: Pick<User, 'id' | 'userType'>;
  remember: boolean;
  now: Date;
};

export type CreateAuthSessionResult = {
  sessionId: string;
  ttlSeconds: number;
  cookieMaxAgeSeconds: number | undefined;
};

export async function createAuthSession(
  params: CreateAuthSessionParams,
): Promise<CreateAuthSessionResult> {
  const { sessionStore, user, remember, now } = params;

  const data = {
    userId: user.id,
    userType: user.userType,
    remember,
    createdAt: now.toISOString(),
  };

  const sessionId = await sessionStore.create(data);
  const ttlSeconds = sessionStore.ttlFor(data);

  return {
    sessionId,
    ttlSeconds,
    cookieMaxAgeSeconds: remember ? ttlSeconds : undefined,
  };
}
