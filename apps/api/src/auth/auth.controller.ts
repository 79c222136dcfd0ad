import {
  Controller,
  Post,
  Get,
  Body,
  HttpCode,
  HttpStatus,
} from '@nestjs/common';
import type { User } from '@warden/database';
import { AuthService } from './auth.service';
import { RegisterDto, LoginDto, AuthResponseDto, UserProfileDto } from './dto';
import { CurrentUser, RequireAuthenticated } from './decorators';

/**
 * AuthController — REST endpoints for authentication.
 *
 * Routes:
 * - POST /auth/register  → Create a new user account (public)
 * - POST /auth/login     → Authenticate and receive a bearer token (public)
 * - GET  /auth/me        → Get current user profile (authenticated)
 */
@Controller('auth')
export class AuthController {
  constructor(private readonly authService: AuthService) {}

  /**
   * Register a new user.
   *
   * @returns 201 Created with the new profile (no token)
   * @throws 409 Conflict if email or username already exists
   * @throws 422 Unprocessable Entity if validation fails
   */
  @Post('register')
  @HttpCode(HttpStatus.CREATED)
  async register(@Body() dto: RegisterDto): Promise<UserProfileDto> {
    return this.authService.register(dto);
  }

  /**
   * Login with email and password, sent as JSON or form-encoded.
   *
   * @returns 200 OK with access token
   * @throws 401 Unauthorized if credentials are invalid
   * @throws 403 Forbidden if the account is deactivated
   */
  @Post('login')
  @HttpCode(HttpStatus.OK)
  async login(@Body() dto: LoginDto): Promise<AuthResponseDto> {
    return this.authService.login(dto);
  }

  /**
   * Get the authenticated user's profile, as currently stored.
   *
   * @throws 401 Unauthorized if token is missing/invalid/expired
   * @throws 403 Forbidden if the account has been deactivated
   */
  @Get('me')
  @RequireAuthenticated()
  getProfile(@CurrentUser() user: User): UserProfileDto {
    return UserProfileDto.fromEntity(user);
  }
}
