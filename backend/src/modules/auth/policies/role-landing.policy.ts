/**
 * WHY:
 * - After login each user type lands on its own page; the gate protects the same paths.
 * - Keep the mapping pure + unit-testable and single-sourced.
 */

import type { UserType } from '../../users/user.types';

export const ROLE_LANDING_PATHS: Readonly<Record<UserType, string>> = {
  teacher: '/teachers',
  student: '/students',
};

export function landingPathFor(userType: UserType): string {
  return ROLE_LANDING_PATHS[userType];
}
