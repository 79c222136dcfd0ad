import { ConflictException } from '@nestjs/common';

/**
 * Thrown when registering with an email that already belongs to a user.
 *
 * HTTP 409 Conflict.
 */
export class EmailTakenException extends ConflictException {
  constructor() {
    super({
      statusCode: 409,
      error: 'Conflict',
      message: 'Email already registered',
    });
  }
}
