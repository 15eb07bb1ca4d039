/**
 * backend/src/shared/security/bcrypt-password-hasher.ts
 *
 * WHY:
 * - Bcrypt is a salted, deliberately slow password hash.
 * - We encapsulate it behind PasswordHasher so the rest of the app stays clean.
 * - bcrypt.hash/compare run on the libuv thread pool, so hashing does not stall
 *   the event loop for other requests.
 *
 * HOW TO USE:
 * - const hasher = new BcryptPasswordHasher({ cost: 12 })
 * - const hash = await hasher.hash('secret')
 * - const ok = await hasher.verify('secret', hash)
 */

import bcrypt from 'bcrypt';
import type { PasswordHasher } from './password-hasher';

/** Work factor used everywhere outside tests (2^12 rounds). */
export const BCRYPT_COST = 12;

export class BcryptPasswordHasher implements PasswordHasher {
  readonly cost: number;

  constructor(opts?: { cost?: number }) {
    this.cost = opts?.cost ?? BCRYPT_COST;
  }

  async hash(plain: string): Promise<string> {
    return bcrypt.hash(plain, this.cost);
  }

  async verify(plain: string, hash: string): Promise<boolean> {
    return bcrypt.compare(plain, hash);
  }
}
