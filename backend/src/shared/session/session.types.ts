/**
 * src/shared/session/session.types.ts
 *
 * WHY:
 * - Defines the server-side session data model.
 * - Sessions are stored in the Cache (memory or Redis) with a TTL.
 *
 * RULES:
 * - Session data must be JSON-serializable and is re-validated on every read.
 * - Never store passwords or hashes in session data.
 * - remember=false → sliding TTL (refreshed per request), browser-session cookie.
 *   remember=true  → fixed long TTL, persistent cookie with the same Max-Age.
 */

import { z } from 'zod';
import { USER_TYPES } from '../../modules/users/user.types';

export const SessionDataSchema = z.object({
  userId: z.number().int().positive(),
  userType: z.enum(USER_TYPES),
  remember: z.boolean(),
  createdAt: z.string(), // ISO string (JSON-safe)
});

export type SessionData = z.infer<typeof SessionDataSchema>;

export const SESSION_COOKIE_NAME = 'sid';

/**
 * Session prefix in the cache. Full key: `session:{sessionId}`.
 * Keeps session keys isolated from other cache entries.
 */
export const SESSION_KEY_PREFIX = 'session';

export type SessionTtlPolicy = Readonly<{
  ttlSeconds: number;
  rememberMeTtlSeconds: number;
}>;
