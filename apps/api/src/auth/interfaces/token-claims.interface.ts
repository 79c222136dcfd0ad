import type { UserRole } from '@warden/database';

/**
 * Claim set signed into every access token.
 *
 * `sub` carries the email, the identity pointer the session resolver uses to
 * re-fetch the account. `role` and `user_id` travel for clients' convenience
 * only; authorization always reads them from the store.
 */
export interface TokenPayload {
  sub: string;
  role: UserRole;
  user_id: number;
  /** Issued-at, epoch seconds */
  iat: number;
  /** Expiry, epoch seconds */
  exp: number;
}

/** Claims as handed to the rest of the application after decoding. */
export interface TokenClaims {
  subject: string;
  role: UserRole;
  userId: number;
  issuedAt: Date;
  expiresAt: Date;
}

/** Why a token failed to decode. Never sent to the client. */
export type TokenFailureReason = 'invalid_signature' | 'expired' | 'malformed';

export type DecodeResult =
  | { ok: true; claims: TokenClaims }
  | { ok: false; reason: TokenFailureReason };

export interface IssuedToken {
  token: string;
  /** Lifetime in seconds */
  expiresIn: number;
  expiresAt: Date;
}
