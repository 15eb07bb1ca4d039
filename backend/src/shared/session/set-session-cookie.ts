/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login sets the cookie, logout clears it, and the middleware reads it. All three
 *   must agree on name, signature format and flags.
 * - Centralising here means the HttpOnly / SameSite / Secure (prod) rules are defined
 *   in one place and can never drift between controllers.
 *
 * FORMAT:
 * - sid=<sessionId>.<HMAC-SHA256(sessionId, SESSION_SECRET) base64url>
 *
 * RULES:
 * - No business logic here.
 * - No store access here.
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';
import type { KeyedHasher } from '../security/keyed-hasher';
import { appendCookie } from '../http/cookies';

export type SessionCookieOptions = Readonly<{
  signer: KeyedHasher;
  isProduction: boolean;
}>;

export function signSessionId(signer: KeyedHasher, sessionId: string): string {
  return `${sessionId}.${signer.hash(sessionId)}`;
}

/** Returns the session id when the signature is valid, otherwise null. */
export function unsignSessionId(signer: KeyedHasher, cookieValue: string): string | null {
  const dot = cookieValue.lastIndexOf('.');
  if (dot <= 0 || dot === cookieValue.length - 1) return null;

  const sessionId = cookieValue.slice(0, dot);
  const signature = cookieValue.slice(dot + 1);

  return signer.matches(sessionId, signature) ? sessionId : null;
}

/**
 * @param maxAgeSeconds set for remember-me sessions; omitted → cookie ends with the browser session.
 */
export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  opts: SessionCookieOptions & { maxAgeSeconds?: number },
): void {
  appendCookie(reply, SESSION_COOKIE_NAME, signSessionId(opts.signer, sessionId), {
    secure: opts.isProduction,
    maxAgeSeconds: opts.maxAgeSeconds,
  });
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  appendCookie(reply, SESSION_COOKIE_NAME, '', { secure: isProduction, maxAgeSeconds: 0 });
}
