import { ConflictException } from '@nestjs/common';

/**
 * Thrown when registering with a username that already belongs to a user.
 *
 * HTTP 409 Conflict.
 */
export class UsernameTakenException extends ConflictException {
  constructor() {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: 'Username already registered',
    });
  }
}
