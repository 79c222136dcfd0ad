import { IsEmail, IsNotEmpty, IsString } from 'class-validator';

/**
 * DTO for user login, from a JSON or a form-encoded body.
 *
 * Only presence and email syntax are checked here. Credential verification
 * happens in AuthService so the failure message stays the same whether the
 * email or the password was wrong.
 */
export class LoginDto {
  @IsEmail({}, { message: 'Please provide a valid email address' })
  @IsNotEmpty({ message: 'Email is required' })
  email!: string;

  @IsString()
  @IsNotEmpty({ message: 'Password is required' })
  password!: string;
}
