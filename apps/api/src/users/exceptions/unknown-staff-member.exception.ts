import { UnprocessableEntityException } from '@nestjs/common';

/**
 * Thrown when an account is linked to a staff entry that does not exist.
 *
 * HTTP 422, in the same `errors` shape the ValidationPipe uses.
 */
export class UnknownStaffMemberException extends UnprocessableEntityException {
  constructor(staffId: number | null) {
    super({
      statusCode: 422,
      error: 'Unprocessable Entity',
      message: 'Validation failed',
      errors: [
        {
          field: 'staffId',
          messages: [`Staff member ${staffId ?? '(unknown)'} does not exist`],
        },
      ],
    });
  }
}
