import { ForbiddenException } from '@nestjs/common';

/**
 * Thrown when the identity is established but the account is deactivated,
 * at login or when a still-valid token is presented.
 *
 * HTTP 403 Forbidden.
 */
export class AccountInactiveException extends ForbiddenException {
  constructor() {
    super({
      statusCode: 403,
      error: 'Forbidden',
      message: 'Inactive user',
    });
  }
}
