import type { User, UserRole } from '@warden/database';

/** Fields required to persist a new account. */
export interface NewUser {
  username: string;
  /** Already normalized (see normalizeEmail) */
  email: string;
  passwordHash: string;
  role?: UserRole;
  isActive?: boolean;
  staffId?: number | null;
}

/** Fields an administrator may change on an existing account. */
export type UserChanges = Partial<Pick<User, 'role' | 'isActive' | 'staffId'>>;

/**
 * Credential store adapter — the only way the auth core reaches user
 * records. Lookups by email expect a normalized address.
 */
export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  findByUsername(username: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  list(): Promise<User[]>;

  /** @throws UserConflictError when the email or username is already used */
  create(data: NewUser): Promise<User>;

  /**
   * Returns null when no user has this id.
   * @throws UnknownStaffMemberError when `staffId` names no staff entry
   */
  update(id: number, changes: UserChanges): Promise<User | null>;
}

/** Injection token for the UserStore implementation. */
export const USER_STORE = Symbol('USER_STORE');

/**
 * Raised by a store when a unique constraint rejects a new account. Covers
 * the race between the service's existence checks and the insert.
 */
export class UserConflictError extends Error {
  constructor(readonly field: 'email' | 'username') {
    super(`User with this ${field} already exists`);
    this.name = 'UserConflictError';
  }
}

/** Raised by a store when a staff link points at no staff entry. */
export class UnknownStaffMemberError extends Error {
  constructor(readonly staffId: number | null) {
    super(`Staff member ${staffId ?? '(unknown)'} does not exist`);
    this.name = 'UnknownStaffMemberError';
  }
}

/**
 * Emails are compared case-insensitively: stored and looked up trimmed and
 * lower-cased.
 */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
