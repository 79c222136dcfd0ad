import { Inject, Injectable, Logger } from '@nestjs/common';
import type { User } from '@warden/database';
import {
  USER_STORE,
  UserConflictError,
  UserStore,
  normalizeEmail,
} from '../users/user-store';
import { RegisterDto, LoginDto, AuthResponseDto, UserProfileDto } from './dto';
import {
  AccountInactiveException,
  EmailTakenException,
  InvalidCredentialsException,
  UsernameTakenException,
} from './exceptions';
import { PasswordHasher } from './password-hasher.service';
import { TokenCodec } from './token-codec.service';

/**
 * AuthService — registration, credential verification and token issuance.
 *
 * Security considerations:
 * - An unknown email and a wrong password fail identically
 *   (InvalidCredentialsException), and an unknown email still pays for one
 *   bcrypt hash so both paths take comparable time
 * - A deactivated account is reported as such (AccountInactiveException),
 *   but only after its password has been verified
 * - Password hash is never returned in any response
 */
@Injectable()
export class AuthService {
  private readonly logger = new Logger(AuthService.name);

  constructor(
    @Inject(USER_STORE)
    private readonly userStore: UserStore,
    private readonly passwordHasher: PasswordHasher,
    private readonly tokenCodec: TokenCodec,
  ) {}

  /**
   * Register a new user account with the default role.
   *
   * @throws UsernameTakenException if the username is already taken
   * @throws EmailTakenException if the email is already taken
   */
  async register(dto: RegisterDto): Promise<UserProfileDto> {
    const email = normalizeEmail(dto.email);

    // ── Check for existing username / email ───────────────
    if (await this.userStore.findByUsername(dto.username)) {
      throw new UsernameTakenException();
    }
    if (await this.userStore.findByEmail(email)) {
      throw new EmailTakenException();
    }

    // ── Hash password ─────────────────────────────────────
    const passwordHash = await this.passwordHasher.hash(dto.password);

    // ── Create user ───────────────────────────────────────
    let user: User;
    try {
      user = await this.userStore.create({
        username: dto.username,
        email,
        passwordHash,
      });
    } catch (error) {
      if (error instanceof UserConflictError) {
        throw error.field === 'username'
          ? new UsernameTakenException()
          : new EmailTakenException();
      }
      throw error;
    }

    this.logger.log(`User registered: ${user.id} (${user.email})`);

    return UserProfileDto.fromEntity(user);
  }

  /**
   * Verify an email/password pair.
   *
   * @throws InvalidCredentialsException if the email is unknown or the password is wrong
   * @throws AccountInactiveException if the credentials match a deactivated account
   */
  async authenticate(email: string, password: string): Promise<User> {
    const user = await this.userStore.findByEmail(normalizeEmail(email));

    if (!user) {
      await this.passwordHasher.hash(password);
      throw new InvalidCredentialsException();
    }

    const isPasswordValid = await this.passwordHasher.verify(
      password,
      user.passwordHash,
    );
    if (!isPasswordValid) {
      this.logger.warn(`Failed login for user ${user.id}`);
      throw new InvalidCredentialsException();
    }

    if (!user.isActive) {
      this.logger.warn(`Login refused for deactivated user ${user.id}`);
      throw new AccountInactiveException();
    }

    return user;
  }

  /**
   * Authenticate and issue an access token.
   */
  async login(dto: LoginDto): Promise<AuthResponseDto> {
    const user = await this.authenticate(dto.email, dto.password);

    const issued = this.tokenCodec.issue({
      subject: user.email,
      role: user.role,
      userId: user.id,
    });

    this.logger.log(`User logged in: ${user.id} (${user.email})`);

    return new AuthResponseDto(issued);
  }
}
