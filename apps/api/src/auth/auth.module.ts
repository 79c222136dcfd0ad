import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigType } from '@nestjs/config';
import { JwtModule } from '@nestjs/jwt';
import { authConfig } from '../config/auth.config';
import { UsersModule } from '../users/users.module';
import { AuthService } from './auth.service';
import { AuthController } from './auth.controller';
import { CLOCK, systemClock } from './clock';
import { SessionGuard } from './guards/session.guard';
import { PasswordHasher } from './password-hasher.service';
import { SessionResolver } from './session-resolver.service';
import { TokenCodec } from './token-codec.service';

/**
 * AuthModule — encapsulates all authentication and authorization concerns.
 *
 * Provides:
 * - Password hashing, token issuance and decoding
 * - Session resolution from bearer tokens
 * - The global SessionGuard that enforces `@Access()` policies on every
 *   controller in the application
 * - REST endpoints for register/login/profile
 *
 * Other feature modules only need the decorators from `./decorators`; the
 * guard applies to them without importing this module.
 */
@Module({
  imports: [
    ConfigModule.forFeature(authConfig),
    UsersModule,

    JwtModule.registerAsync({
      imports: [ConfigModule.forFeature(authConfig)],
      inject: [authConfig.KEY],
      useFactory: (config: ConfigType<typeof authConfig>) => ({
        secret: config.jwtSecret,
        signOptions: { algorithm: config.algorithm },
        verifyOptions: { algorithms: [config.algorithm] },
      }),
    }),
  ],
  controllers: [AuthController],
  providers: [
    AuthService,
    PasswordHasher,
    TokenCodec,
    SessionResolver,
    { provide: CLOCK, useValue: systemClock },
    { provide: APP_GUARD, useClass: SessionGuard },
  ],
  exports: [AuthService, SessionResolver, TokenCodec, PasswordHasher],
})
export class AuthModule {}
