import { ForbiddenException } from '@nestjs/common';
import type { UserRole } from '@warden/database';

/**
 * Thrown when an authenticated user lacks the role a route requires.
 *
 * HTTP 403 Forbidden — carries the roles that would have been accepted.
 */
export class InsufficientRoleException extends ForbiddenException {
  constructor(readonly requiredRoles: readonly UserRole[]) {
    super({
      statusCode: 403,
      error: 'Forbidden',
      message: `Requires role: ${requiredRoles.join(' or ')}`,
      requiredRoles,
    });
  }
}
