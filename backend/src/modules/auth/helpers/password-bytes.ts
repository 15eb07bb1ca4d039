/**
 * backend/src/modules/auth/helpers/password-bytes.ts
 *
 * bcrypt hashes the UTF-8 bytes of a password and ignores everything past byte 72.
 * A password of 72 characters can be far longer than that once encoded.
 */

import { PASSWORD_POLICY } from '../auth.constants';

export function passwordFitsHasher(password: string): boolean {
  return Buffer.byteLength(password, 'utf8') <= PASSWORD_POLICY.maxBytes;
}
