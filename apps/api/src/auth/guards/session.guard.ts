import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import { ExtractJwt } from 'passport-jwt';
import { AccessPolicy, authorize, toleratesAnonymous } from '../access-policy';
import { ACCESS_POLICY_KEY } from '../decorators/access.decorator';
import {
  AccountInactiveException,
  InsufficientRoleException,
  UnauthenticatedException,
} from '../exceptions';
import type { AuthenticatedRequest, Session } from '../interfaces';
import { SessionResolver } from '../session-resolver.service';

const extractBearerToken = ExtractJwt.fromAuthHeaderAsBearerToken();

/**
 * SessionGuard — the single per-request authentication stage, registered
 * globally as APP_GUARD.
 *
 * For routes carrying an access policy it:
 * 1. extracts the token from `Authorization: Bearer <token>`
 * 2. resolves it once through SessionResolver
 * 3. attaches the result to `request.auth`
 * 4. evaluates the policy against the resolved user
 *
 * Routes without a policy pass through untouched.
 */
@Injectable()
export class SessionGuard implements CanActivate {
  constructor(
    private readonly reflector: Reflector,
    private readonly sessionResolver: SessionResolver,
  ) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    const policy = this.reflector.getAllAndOverride<AccessPolicy | undefined>(
      ACCESS_POLICY_KEY,
      [context.getHandler(), context.getClass()],
    );

    if (!policy) {
      return true;
    }

    const request = context.switchToHttp().getRequest<AuthenticatedRequest>();
    const session = await this.establishSession(request, policy);
    request.auth = session;

    const decision = authorize(policy, session?.user ?? null);
    if (decision.allowed) {
      return true;
    }

    if (decision.reason === 'forbidden') {
      throw new InsufficientRoleException(decision.requiredRoles);
    }
    throw new UnauthenticatedException();
  }

  private async establishSession(
    request: AuthenticatedRequest,
    policy: AccessPolicy,
  ): Promise<Session | null> {
    const token = extractBearerToken(request);
    if (!token) {
      return null;
    }

    try {
      return await this.sessionResolver.resolve(token);
    } catch (error) {
      const isAuthFailure =
        error instanceof UnauthenticatedException ||
        error instanceof AccountInactiveException;

      // Optional routes continue anonymously; every other failure propagates
      if (isAuthFailure && toleratesAnonymous(policy)) {
        return null;
      }
      throw error;
    }
  }
}
