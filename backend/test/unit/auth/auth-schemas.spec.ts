import { describe, it, expect } from 'vitest';
import {
  loginSchema,
  registerFormSchema,
  registerSchema,
  toFieldErrors,
} from '../../../src/modules/auth/auth.schemas';

const valid = {
  email: 'bob@example.com',
  password: 'secret1',
  lastName: 'Smith',
  firstName: 'Bob',
  userType: 'teacher',
};

function fieldErrorsFor(input: Record<string, unknown>) {
  const result = registerSchema.safeParse(input);
  if (result.success) throw new Error('expected validation to fail');
  return toFieldErrors(result.error);
}

describe('registerSchema', () => {
  it('trims text fields and lower-cases the email', () => {
    const result = registerSchema.parse({
      ...valid,
      email: '  Bob@Example.COM ',
      lastName: ' Smith ',
      firstName: 'Bob  ',
    });

    expect(result).toEqual({
      email: 'bob@example.com',
      password: 'secret1',
      lastName: 'Smith',
      firstName: 'Bob',
      userType: 'teacher',
    });
  });

  it('keeps the password verbatim', () => {
    expect(registerSchema.parse({ ...valid, password: ' pass word ' }).password).toBe(
      ' pass word ',
    );
  });

  it('requires an email', () => {
    expect(fieldErrorsFor({ ...valid, email: '   ' })).toEqual({ email: 'Email is required' });
  });

  it('rejects a malformed email', () => {
    expect(fieldErrorsFor({ ...valid, email: 'not-an-email' })).toEqual({
      email: 'Enter a valid email address',
    });
  });

  it('rejects an email longer than 120 characters', () => {
    const email = `${'a'.repeat(110)}@example.com`;
    expect(fieldErrorsFor({ ...valid, email })).toEqual({
      email: 'Email must be at most 120 characters',
    });
  });

  it('reports "required" before "too short" for an empty password', () => {
    expect(fieldErrorsFor({ ...valid, password: '' })).toEqual({
      password: 'Password is required',
    });
  });

  it('enforces the password length policy', () => {
    expect(fieldErrorsFor({ ...valid, password: 'abc' })).toEqual({
      password: 'Password must be at least 6 characters',
    });
    expect(fieldErrorsFor({ ...valid, password: 'x'.repeat(73) })).toEqual({
      password: 'Password must be at most 72 characters',
    });
  });

  it('measures the password in UTF-8 bytes as well as characters', () => {
    // 36 two-byte characters fill bcrypt's 72-byte input exactly
    expect(registerSchema.parse({ ...valid, password: 'é'.repeat(36) }).password).toBe(
      'é'.repeat(36),
    );

    // 49 characters, 85 bytes: within the character limit, past the byte limit
    expect(fieldErrorsFor({ ...valid, password: 'é'.repeat(36) + 'correct-horse' })).toEqual({
      password: 'Password must be at most 72 bytes (some characters take more than one byte)',
    });
  });

  it('enforces name lengths', () => {
    expect(fieldErrorsFor({ ...valid, lastName: 'A', firstName: '' })).toEqual({
      lastName: 'Last name must be at least 2 characters',
      firstName: 'First name is required',
    });
    expect(fieldErrorsFor({ ...valid, firstName: 'n'.repeat(101) })).toEqual({
      firstName: 'First name must be at most 100 characters',
    });
  });

  it('only accepts teacher or student', () => {
    expect(fieldErrorsFor({ ...valid, userType: 'admin' })).toEqual({
      userType: 'Choose whether you are a teacher or a student',
    });
    expect(fieldErrorsFor({ ...valid, userType: '' })).toEqual({
      userType: 'Choose whether you are a teacher or a student',
    });
  });
});

describe('registerFormSchema', () => {
  it('accepts a matching confirmation', () => {
    const result = registerFormSchema.safeParse({ ...valid, confirmPassword: 'secret1' });
    expect(result.success).toBe(true);
  });

  it('rejects a mismatched confirmation on the confirmPassword field', () => {
    const result = registerFormSchema.safeParse({ ...valid, confirmPassword: 'secret2' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(toFieldErrors(result.error)).toEqual({ confirmPassword: 'Passwords must match' });
    }
  });
});

describe('loginSchema', () => {
  it('defaults remember to false', () => {
    expect(loginSchema.parse({ email: 'A@B.io', password: 'x' })).toEqual({
      email: 'a@b.io',
      password: 'x',
      remember: false,
    });
  });

  it('requires both fields', () => {
    const result = loginSchema.safeParse({ email: '', password: '' });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(toFieldErrors(result.error)).toEqual({
        email: 'Email is required',
        password: 'Password is required',
      });
    }
  });
});
