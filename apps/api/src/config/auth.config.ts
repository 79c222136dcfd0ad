import { Logger } from '@nestjs/common';
import { registerAs } from '@nestjs/config';

/** HMAC algorithms the token codec may be configured with. */
export const SUPPORTED_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type SigningAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

/** Secrets shorter than this are accepted but reported at startup. */
export const RECOMMENDED_SECRET_LENGTH = 32;

/**
 * Immutable auth settings, built once at process start and injected
 * wherever tokens or password hashes are produced.
 */
export interface AuthConfig {
  readonly jwtSecret: string;
  readonly algorithm: SigningAlgorithm;
  readonly tokenLifetimeMinutes: number;
  readonly clockToleranceSeconds: number;
  readonly bcryptSaltRounds: number;
}

type EnvSource = Record<string, string | undefined>;

function isSigningAlgorithm(value: string): value is SigningAlgorithm {
  return SUPPORTED_ALGORITHMS.some((algorithm) => algorithm === value);
}

function readInteger(
  env: EnvSource,
  name: string,
  fallback: number,
  min: number,
  max = Number.MAX_SAFE_INTEGER,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(
      `${name} must be an integer between ${min} and ${max}, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Parse and validate the auth settings from an environment map.
 *
 * The signing secret is never generated here: a random per-process secret
 * would silently invalidate every outstanding token on restart.
 */
export function loadAuthConfig(env: EnvSource = process.env): AuthConfig {
  const jwtSecret = env['JWT_SECRET'];
  if (!jwtSecret) {
    throw new Error(
      'JWT_SECRET is not defined in environment variables. ' +
        'This is a critical configuration error — the application cannot start without it.',
    );
  }

  if (jwtSecret.length < RECOMMENDED_SECRET_LENGTH) {
    new Logger('AuthConfig').warn(
      `JWT_SECRET is shorter than ${RECOMMENDED_SECRET_LENGTH} characters`,
    );
  }

  const algorithm = env['JWT_ALGORITHM'] || 'HS256';
  if (!isSigningAlgorithm(algorithm)) {
    throw new Error(
      `JWT_ALGORITHM must be one of ${SUPPORTED_ALGORITHMS.join(', ')}, got "${algorithm}"`,
    );
  }

  return Object.freeze({
    jwtSecret,
    algorithm,
    tokenLifetimeMinutes: readInteger(env, 'JWT_EXPIRATION_MINUTES', 30, 1),
    clockToleranceSeconds: readInteger(env, 'JWT_CLOCK_TOLERANCE_SECONDS', 0, 0),
    bcryptSaltRounds: readInteger(env, 'BCRYPT_SALT_ROUNDS', 12, 4, 31),
  });
}

export const authConfig = registerAs('auth', (): AuthConfig => loadAuthConfig());
