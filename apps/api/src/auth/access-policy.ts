import type { User, UserRole } from '@warden/database';

/**
 * Per-route access policy. Routes without one are public and never resolve
 * a session.
 */
export type AccessPolicy =
  | { kind: 'authenticated' }
  | { kind: 'role'; role: UserRole }
  | { kind: 'any-role'; roles: readonly UserRole[] }
  | { kind: 'optional' };

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: 'unauthenticated' }
  | { allowed: false; reason: 'forbidden'; requiredRoles: readonly UserRole[] };

/** Builders for the policy values routes attach with `@Access()`. */
export const Policies = {
  /** Any resolved, active user */
  authenticated: (): AccessPolicy => ({ kind: 'authenticated' }),

  /** Exactly this role */
  role: (role: UserRole): AccessPolicy => ({ kind: 'role', role }),

  /** Any of these roles */
  anyRole: (...roles: UserRole[]): AccessPolicy => ({
    kind: 'any-role',
    roles: Object.freeze([...roles]),
  }),

  /** Resolve if possible, otherwise continue anonymously */
  optional: (): AccessPolicy => ({ kind: 'optional' }),
} as const;

/**
 * Whether a policy resolves the session even when that fails. Only
 * `optional` turns a resolution failure into an anonymous request.
 */
export function toleratesAnonymous(policy: AccessPolicy): boolean {
  return policy.kind === 'optional';
}

const ALLOW: AccessDecision = { allowed: true };

/**
 * Evaluate a policy against the resolved user (null when none was
 * established). Pure: no lookups, no side effects.
 */
export function authorize(
  policy: AccessPolicy,
  user: User | null,
): AccessDecision {
  if (policy.kind === 'optional') {
    return ALLOW;
  }

  if (!user) {
    return { allowed: false, reason: 'unauthenticated' };
  }

  switch (policy.kind) {
    case 'authenticated':
      return ALLOW;
    case 'role':
      return user.role === policy.role
        ? ALLOW
        : { allowed: false, reason: 'forbidden', requiredRoles: [policy.role] };
    case 'any-role':
      return policy.roles.includes(user.role)
        ? ALLOW
        : { allowed: false, reason: 'forbidden', requiredRoles: policy.roles };
  }
}
