/**
 * src/shared/session/session.store.ts
 *
 * WHY:
 * - Server-side session management through the Cache interface.
 * - Sessions are instantly revocable via del(); logout needs no token blacklist.
 * - Expiry is enforced by the cache TTL, so an expired session can never be read.
 *
 * RULES:
 * - Depends only on Cache (DIP). Works with Redis in prod, InMemCache in tests.
 * - No HTTP concerns here (cookie handling lives in set-session-cookie / middleware).
 * - No business rules.
 */

import { randomUUID } from 'node:crypto';
import type { Cache } from '../cache/cache';
import { SESSION_KEY_PREFIX, SessionDataSchema } from './session.types';
import type { SessionData, SessionTtlPolicy } from './session.types';
import { logger } from '../logger/logger';

export class SessionStore {
  constructor(
    private readonly cache: Cache,
    private readonly policy: SessionTtlPolicy,
  ) {}

  private key(sessionId: string): string {
    return `${SESSION_KEY_PREFIX}:${sessionId}`;
  }

  ttlFor(data: Pick<SessionData, 'remember'>): number {
    return data.remember ? this.policy.rememberMeTtlSeconds : this.policy.ttlSeconds;
  }

  /**
   * Creates a new session and returns its ID.
   * The caller is responsible for setting the cookie.
   */
  async create(data: SessionData): Promise<string> {
    const sessionId = randomUUID();

    await this.cache.set(this.key(sessionId), JSON.stringify(data), {
      ttlSeconds: this.ttlFor(data),
    });

    return sessionId;
  }

  /**
   * Loads session data by ID. Returns null if expired, not found, or corrupted.
   */
  async get(sessionId: string): Promise<SessionData | null> {
    const raw = await this.cache.get(this.key(sessionId));
    if (!raw) return null;

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      json = null;
    }

    const parsed = SessionDataSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('session.corrupted', { flow: 'session' });
      await this.destroy(sessionId);
      return null;
    }

    return parsed.data;
  }

  /**
   * Slides the expiry window of a non-remembered session.
   * Remembered sessions keep the fixed lifetime they were created with.
   * Only the TTL moves: a session destroyed meanwhile (concurrent logout) stays gone.
   */
  async touch(sessionId: string, data: Pick<SessionData, 'remember'>): Promise<void> {
    if (data.remember) return;

    await this.cache.expire(this.key(sessionId), this.ttlFor(data));
  }

  /**
   * Destroys a single session (logout, rotation on login). Idempotent.
   */
  async destroy(sessionId: string): Promise<void> {
    await this.cache.del(this.key(sessionId));
  }
}
