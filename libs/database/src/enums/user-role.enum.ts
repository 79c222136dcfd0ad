/**
 * Coarse-grained permission category assigned to a user.
 *
 * Adding a role means adding a member here and a value to the
 * `user_role_enum` type in a new migration.
 */
export enum UserRole {
  /** Default role for self-registered accounts */
  USER = 'user',

  /** Manages users and the staff directory */
  ADMIN = 'admin',
}

const USER_ROLES: ReadonlySet<string> = new Set<string>(Object.values(UserRole));

/** Type guard for the role claim of a decoded token. */
export function isUserRole(value: unknown): value is UserRole {
  return typeof value === 'string' && USER_ROLES.has(value);
}
