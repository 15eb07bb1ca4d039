/**
 * backend/src/modules/auth/auth.constants.ts
 *
 * WHY:
 * - Central place for auth domain constants shared across flows, schemas and views.
 *
 * RULES:
 * - Must not import from DB/HTTP/framework code.
 */

export const PASSWORD_POLICY = {
  minLength: 6,
  maxLength: 72,
  // bcrypt ignores input past 72 UTF-8 bytes; longer passwords are refused, never truncated.
  maxBytes: 72,
} as const;

export const FIELD_LIMITS = {
  emailMax: 120,
  nameMin: 2,
  nameMax: 100,
} as const;

export const AUTH_MESSAGES = {
  registered: 'Your account has been created. You can now log in.',
  loggedOut: 'You have been logged out.',
  welcome: (firstName: string) => `Welcome back, ${firstName}!`,
} as const;
