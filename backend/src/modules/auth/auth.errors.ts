/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Security-safe: login errors never reveal whether an email exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords or hashes in meta or fieldErrors.
 */

import { AppError, type AppErrorMeta, type FieldErrors } from '../../shared/http/errors';

export const DUPLICATE_EMAIL_MESSAGE = 'An account with this email already exists.';
export const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password.';

export const AuthErrors = {
  /** Malformed email, weak password, unknown user type, missing field. */
  invalidInput(fieldErrors: FieldErrors, meta?: AppErrorMeta) {
    return AppError.validationError('Please correct the errors below.', fieldErrors, meta);
  },

  /** Registration: email already present (pre-check hit or unique-index violation). */
  duplicateEmail(meta?: AppErrorMeta) {
    return AppError.conflict(DUPLICATE_EMAIL_MESSAGE, { email: DUPLICATE_EMAIL_MESSAGE }, meta);
  },

  /** Login: unknown email OR wrong password. Intentionally identical for both. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized(INVALID_CREDENTIALS_MESSAGE, meta);
  },
} as const;
