import {
  IsEmail,
  IsNotEmpty,
  IsString,
  Matches,
  MaxLength,
  MinLength,
} from 'class-validator';

/**
 * DTO for user registration.
 *
 * Validated by the global ValidationPipe (whitelist + forbidNonWhitelisted).
 * Password constraints: 8–128 chars, no complexity rules — bcrypt handles
 * any string.
 */
export class RegisterDto {
  @IsString()
  @MinLength(3, { message: 'Username must be at least 3 characters long' })
  @MaxLength(50, { message: 'Username must be at most 50 characters long' })
  @Matches(/^[A-Za-z0-9_.-]+$/, {
    message: 'Username may only contain letters, digits, ".", "_" and "-"',
  })
  username!: string;

  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  @MaxLength(255)
  email!: string;

  @IsString()
  @MinLength(8, { message: 'Password must be at least 8 characters long' })
  @MaxLength(128, { message: 'Password must be at most 128 characters long' })
  password!: string;
}
