/**
 * backend/src/modules/users/index.ts
 *
 * WHY:
 * - Define the public surface of the users module.
 * - Prevent cross-module coupling via deep imports into /queries or /dal.
 *
 * RULES:
 * - Only export stable contracts needed by other modules.
 */

export {
  getUserByEmail,
  getUserById,
  getUserCredentialsByEmail,
  listUsers,
  countUsersByType,
} from './queries/user.queries';
export { UserRepo } from './dal/user.repo';
export type { InsertUserParams } from './dal/user.repo';
export { USER_TYPES, isUserType } from './user.types';
export type { User, UserId, UserType, UserCredentials } from './user.types';
