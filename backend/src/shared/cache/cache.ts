/**
 * src/shared/cache/cache.ts
 *
 * WHY:
 * - Session state must live outside the request and expire on its own.
 * - We depend on an abstraction so the same SessionStore works over Redis
 *   (shared across processes) and in memory (single process, tests).
 *
 * HOW TO USE:
 * - cache.get(key)
 * - cache.set(key, value, { ttlSeconds })
 * - cache.expire(key, ttlSeconds)
 * - cache.del(key)
 */

export interface CacheSetOptions {
  /** Omit for a key that never expires. Re-setting a key replaces its TTL. */
  ttlSeconds?: number;
}

export interface Cache {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, opts?: CacheSetOptions): Promise<void>;
  del(key: string): Promise<void>;

  /** Moves the expiry of an existing key. A missing or expired key stays missing. */
  expire(key: string, ttlSeconds: number): Promise<void>;

  /** Releases connections (Redis) or drops every entry (memory). */
  close(): Promise<void>;
}
