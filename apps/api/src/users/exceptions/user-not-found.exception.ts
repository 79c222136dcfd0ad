import { NotFoundException } from '@nestjs/common';

/**
 * Thrown when an administrator addresses an account id that does not exist.
 *
 * HTTP 404 Not Found.
 */
export class UserNotFoundException extends NotFoundException {
  constructor(userId: number) {
    super({
      statusCode: 404,
      error: 'Not Found',
      message: `User ${userId} not found`,
    });
  }
}
