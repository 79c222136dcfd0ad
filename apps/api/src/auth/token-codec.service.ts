import { Inject, Injectable } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import { JwtService } from '@nestjs/jwt';
import { UserRole, isUserRole } from '@warden/database';
import { authConfig } from '../config/auth.config';
import { CLOCK, type Clock } from './clock';
import type {
  DecodeResult,
  IssuedToken,
  TokenFailureReason,
  TokenPayload,
} from './interfaces';

/** jsonwebtoken messages that mean "the MAC did not verify". */
const SIGNATURE_FAILURES = new Set([
  'invalid signature',
  'invalid algorithm',
  'jwt signature is required',
]);

export interface ClaimsInput {
  /** Email of the account the token represents */
  subject: string;
  role: UserRole;
  userId: number;
}

/**
 * TokenCodec — issues and decodes signed, expiring access tokens.
 *
 * Wire format is a compact JWS (`header.payload.signature`) carrying
 * `{ sub, role, user_id, iat, exp }`. The secret and algorithm are fixed for
 * the process; rotating the secret invalidates every outstanding token.
 *
 * Decoding order: structure, then signature, then expiry, then field
 * extraction. Nothing from an unverified payload is ever returned.
 */
@Injectable()
export class TokenCodec {
  constructor(
    private readonly jwtService: JwtService,
    @Inject(authConfig.KEY)
    private readonly config: ConfigType<typeof authConfig>,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  issue(input: ClaimsInput): IssuedToken {
    const iat = Math.floor(this.clock() / 1000);
    const expiresIn = this.config.tokenLifetimeMinutes * 60;

    const payload: TokenPayload = {
      sub: input.subject,
      role: input.role,
      user_id: input.userId,
      iat,
      exp: iat + expiresIn,
    };

    const token = this.jwtService.sign(payload, {
      secret: this.config.jwtSecret,
      algorithm: this.config.algorithm,
    });

    return { token, expiresIn, expiresAt: new Date(payload.exp * 1000) };
  }

  decode(token: string): DecodeResult {
    let payload: Record<string, unknown>;

    try {
      payload = this.jwtService.verify<Record<string, unknown>>(token, {
        secret: this.config.jwtSecret,
        algorithms: [this.config.algorithm],
        clockTolerance: this.config.clockToleranceSeconds,
        clockTimestamp: Math.floor(this.clock() / 1000),
      });
    } catch (error) {
      return { ok: false, reason: classifyVerifyError(error) };
    }

    const { sub, role, user_id: userId, iat, exp } = payload;
    if (
      typeof sub !== 'string' ||
      sub.length === 0 ||
      !isUserRole(role) ||
      typeof userId !== 'number' ||
      !Number.isInteger(userId) ||
      typeof exp !== 'number'
    ) {
      return { ok: false, reason: 'malformed' };
    }

    return {
      ok: true,
      claims: {
        subject: sub,
        role,
        userId,
        issuedAt: new Date((typeof iat === 'number' ? iat : exp) * 1000),
        expiresAt: new Date(exp * 1000),
      },
    };
  }
}

/**
 * Map a jsonwebtoken failure to a reason by error name. Anything that is not
 * a token error (a programming fault) is rethrown.
 */
function classifyVerifyError(error: unknown): TokenFailureReason {
  if (!(error instanceof Error)) {
    throw error;
  }

  switch (error.name) {
    case 'TokenExpiredError':
      return 'expired';
    case 'JsonWebTokenError':
      return SIGNATURE_FAILURES.has(error.message)
        ? 'invalid_signature'
        : 'malformed';
    case 'NotBeforeError':
      return 'malformed';
    default:
      throw error;
  }
}
