import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when no identity could be established from the request: the token
 * is missing, malformed, tampered with, expired, or names a user that no
 * longer exists.
 *
 * HTTP 401 Unauthorized — one message for every sub-case.
 */
export class UnauthenticatedException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Could not validate credentials',
    });
  }
}
