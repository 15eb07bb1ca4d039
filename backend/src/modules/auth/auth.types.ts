/**
 * src/modules/auth/auth.types.ts
 *
 * WHY:
 * - Service-level params/results for register, login and logout.
 * - Params take raw strings: validation is the service's job, so the HTTP layer and
 *   the maintenance CLI share one set of rules.
 *
 * RULES:
 * - Never include raw passwords or hashes in result types.
 */

import type { User, UserId } from '../users/user.types';

export type RegisterParams = {
  email: string;
  password: string;
  lastName: string;
  firstName: string;
  userType: string;
  requestId: string | null;
};

export type RegisterResult = {
  userId: UserId;
};

export type LoginParams = {
  email: string;
  password: string;
  remember: boolean;
  requestId: string | null;
};

export type LoginResult = {
  sessionId: string;
  user: User;
  remember: boolean;
  /** Set for remember-me sessions; undefined → browser-session cookie. */
  cookieMaxAgeSeconds: number | undefined;
  landingPath: string;
};

export type LogoutParams = {
  sessionId: string | null;
  userId: UserId | null;
  requestId: string | null;
};
