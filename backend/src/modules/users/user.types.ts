/**
 * backend/src/modules/users/user.types.ts
 *
 * WHY:
 * - Domain types for the Users module (the credential store).
 * - user_type is fixed at registration and decides which gated page a user may open.
 *
 * RULES:
 * - Keep aligned with DB schema.
 * - Avoid leaking DB naming (snake_case) outside DAL/queries.
 * - The password hash is NOT part of User; only the login query can read it.
 */

export const USER_TYPES = ['student', 'teacher'] as const;

export type UserType = (typeof USER_TYPES)[number];

export type UserId = number;

export type User = {
  id: UserId;
  email: string;
  lastName: string;
  firstName: string;
  userType: UserType;
  createdAt: Date;
};

export type UserCredentials = {
  user: User;
  passwordHash: string;
};

export function isUserType(value: unknown): value is UserType {
  return value === 'student' || value === 'teacher';
}
