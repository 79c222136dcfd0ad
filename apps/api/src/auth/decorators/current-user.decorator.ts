import { createParamDecorator, ExecutionContext } from '@nestjs/common';
import type { User } from '@warden/database';
import type { AuthenticatedRequest, Session } from '../interfaces';
import { UnauthenticatedException } from '../exceptions';

/**
 * Parameter decorator that reads the session the SessionGuard attached.
 * Null on anonymous requests to `@OptionalAuth()` routes.
 */
export const CurrentSession = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): Session | null => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    return request.auth ?? null;
  },
);

/**
 * Parameter decorator that extracts the authenticated user from the request.
 *
 * Usage:
 * ```ts
 * @Get('me')
 * @RequireAuthenticated()
 * getProfile(@CurrentUser() user: User): UserProfileDto {
 *   return UserProfileDto.fromEntity(user);
 * }
 * ```
 *
 * Throws UnauthenticatedException when no session was established, which
 * only happens if the route lacks a policy that requires one.
 */
export const CurrentUser = createParamDecorator(
  (_data: unknown, ctx: ExecutionContext): User => {
    const request = ctx.switchToHttp().getRequest<AuthenticatedRequest>();
    if (!request.auth) {
      throw new UnauthenticatedException();
    }
    return request.auth.user;
  },
);
