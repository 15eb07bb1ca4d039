/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps error pages and form re-renders consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. auth/auth.errors.ts).
 * - fieldErrors are user-facing (rendered next to form inputs); meta is log-only.
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'VALIDATION_ERROR',
  'CONFLICT',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

/** Field name → first message for that field. */
export type FieldErrors = Readonly<Record<string, string>>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;
  readonly fieldErrors?: FieldErrors;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    meta?: AppErrorMeta;
    fieldErrors?: FieldErrors;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
    this.fieldErrors = opts.fieldErrors;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta });
  }

  static validationError(
    message = 'Validation error',
    fieldErrors?: FieldErrors,
    meta?: AppErrorMeta,
  ) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, fieldErrors, meta });
  }

  static conflict(message = 'Conflict', fieldErrors?: FieldErrors, meta?: AppErrorMeta) {
    return new AppError({ code: 'CONFLICT', status: 409, message, fieldErrors, meta });
  }
}
