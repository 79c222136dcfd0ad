import { IsBoolean, IsEnum, IsInt, IsOptional, Min } from 'class-validator';
import { UserRole } from '@warden/database';

/**
 * DTO for an administrator's change to an account.
 *
 * Username and email are immutable here; `staffId: null` unlinks the
 * account from its staff entry.
 */
export class UpdateUserDto {
  @IsOptional()
  @IsEnum(UserRole, { message: 'Role must be one of: user, admin' })
  role?: UserRole;

  @IsOptional()
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @IsInt()
  @Min(1)
  staffId?: number | null;
}
