import { SetMetadata } from '@nestjs/common';
import type { UserRole } from '@warden/database';
import { AccessPolicy, Policies } from '../access-policy';

export const ACCESS_POLICY_KEY = 'warden:access-policy';

/**
 * Attach an access policy to a controller or route handler. A handler-level
 * policy overrides the controller's.
 *
 * Usage:
 * ```ts
 * @Get('me')
 * @Access(Policies.authenticated())
 * getProfile(@CurrentUser() user: User): UserProfileDto { ... }
 * ```
 */
export const Access = (policy: AccessPolicy) =>
  SetMetadata(ACCESS_POLICY_KEY, policy);

export const RequireAuthenticated = () => Access(Policies.authenticated());

export const RequireRole = (role: UserRole) => Access(Policies.role(role));

export const RequireAnyRole = (...roles: UserRole[]) =>
  Access(Policies.anyRole(...roles));

export const OptionalAuth = () => Access(Policies.optional());
