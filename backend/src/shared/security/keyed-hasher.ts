/**
 * src/shared/security/keyed-hasher.ts
 *
 * WHY:
 * - The session cookie carries an opaque session id. Signing it with a server-side
 *   key (SESSION_SECRET) means a guessed or forged id is rejected before any store lookup.
 *
 * KEY:
 * - SESSION_SECRET from environment (min 32 chars, validated at startup).
 * - Generate with: openssl rand -base64 32
 *
 * RULES:
 * - Deterministic: same (input, key) → same output.
 * - Comparisons go through matches(), which is constant-time.
 * - No DB access. No business logic.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export interface KeyedHasher {
  hash(value: string): string;
  matches(value: string, digest: string): boolean;
}

export class HmacSha256KeyedHasher implements KeyedHasher {
  private readonly key: string;

  constructor(key: string) {
    if (key.length < 32) {
      throw new Error(
        `HmacSha256KeyedHasher: key must be at least 32 characters. Got ${key.length}.`,
      );
    }
    this.key = key;
  }

  /**
   * Returns HMAC-SHA256(value, key) as an unpadded base64url string (cookie-safe).
   */
  hash(value: string): string {
    return createHmac('sha256', this.key).update(value).digest('base64url');
  }

  matches(value: string, digest: string): boolean {
    const expected = Buffer.from(this.hash(value));
    const actual = Buffer.from(digest);
    return expected.length === actual.length && timingSafeEqual(expected, actual);
  }
}
