/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes input validation for the Auth module.
 * - registerSchema / loginSchema are the service contract; the *Form* schemas add
 *   browser-only concerns (password confirmation) on top.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Text fields are trimmed before validation; emails are lower-cased. Passwords are
 *   taken verbatim.
 * - One user-facing message per field (the first failing check wins).
 */

import { z } from 'zod';
import type { FieldErrors } from '../../shared/http/errors';
import { USER_TYPES } from '../users/user.types';
import { FIELD_LIMITS, PASSWORD_POLICY } from './auth.constants';
import { passwordFitsHasher } from './helpers/password-bytes';

const emailField = z
  .string({ required_error: 'Email is required' })
  .trim()
  .toLowerCase()
  .min(1, 'Email is required')
  .max(FIELD_LIMITS.emailMax, `Email must be at most ${FIELD_LIMITS.emailMax} characters`)
  .email('Enter a valid email address');

const nameField = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .min(FIELD_LIMITS.nameMin, `${label} must be at least ${FIELD_LIMITS.nameMin} characters`)
    .max(FIELD_LIMITS.nameMax, `${label} must be at most ${FIELD_LIMITS.nameMax} characters`);

export const registerSchema = z.object({
  email: emailField,
  password: z
    .string({ required_error: 'Password is required' })
    .min(1, 'Password is required')
    .min(
      PASSWORD_POLICY.minLength,
      `Password must be at least ${PASSWORD_POLICY.minLength} characters`,
    )
    .max(
      PASSWORD_POLICY.maxLength,
      `Password must be at most ${PASSWORD_POLICY.maxLength} characters`,
    )
    .refine(
      passwordFitsHasher,
      `Password must be at most ${PASSWORD_POLICY.maxBytes} bytes (some characters take more than one byte)`,
    ),
  lastName: nameField('Last name'),
  firstName: nameField('First name'),
  userType: z.enum(USER_TYPES, {
    errorMap: () => ({ message: 'Choose whether you are a teacher or a student' }),
  }),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const registerFormSchema = registerSchema
  .extend({
    confirmPassword: z.string({ required_error: 'Please confirm your password' }),
  })
  .superRefine((form, ctx) => {
    if (form.confirmPassword !== form.password) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['confirmPassword'],
        message: 'Passwords must match',
      });
    }
  });

export type RegisterFormInput = z.infer<typeof registerFormSchema>;

export const loginSchema = z.object({
  email: emailField,
  password: z.string({ required_error: 'Password is required' }).min(1, 'Password is required'),
  remember: z.boolean().default(false),
});

export type LoginInput = z.infer<typeof loginSchema>;

/**
 * Flattens Zod issues into { field: firstMessage } for inline form errors.
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const out: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'form';
    if (!(field in out)) out[field] = issue.message;
  }
  return out;
}
