import { NotFoundException } from '@nestjs/common';

/**
 * Thrown when a staff id does not exist.
 * Maps to HTTP 404 Not Found.
 */
export class StaffMemberNotFoundException extends NotFoundException {
  constructor(staffId: number) {
    super({
      statusCode: 404,
      error: 'Not Found',
      message: `Staff member ${staffId} not found`,
    });
  }
}
