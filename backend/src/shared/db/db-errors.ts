/**
 * backend/src/shared/db/db-errors.ts
 *
 * WHY:
 * - Services must react to "email already taken" without knowing the driver's error shape.
 * - DAL code translates driver errors into StorageError subclasses; services map
 *   those to AppError. The DAL never throws AppError itself.
 *
 * DRIVER CODES:
 * - pg and PGlite both surface the SQLSTATE on `.code`: '23505' is unique_violation.
 */

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class ConstraintViolationError extends StorageError {
  readonly constraint: string;

  constructor(constraint: string, options?: { cause?: unknown }) {
    super(`Constraint violation: ${constraint}`, options);
    this.name = 'ConstraintViolationError';
    this.constraint = constraint;
  }
}

const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return err.code === UNIQUE_VIOLATION;
}
