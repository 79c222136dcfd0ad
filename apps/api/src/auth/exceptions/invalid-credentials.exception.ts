import { UnauthorizedException } from '@nestjs/common';

/**
 * Thrown when login credentials are invalid (wrong email or password).
 *
 * HTTP 401 Unauthorized — the same message for both cases so the
 * response never reveals whether an email is registered.
 */
export class InvalidCredentialsException extends UnauthorizedException {
  constructor() {
    super({
      statusCode: 401,
      error: 'Unauthorized',
      message: 'Incorrect email or password',
    });
  }
}
