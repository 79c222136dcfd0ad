export type {
  TokenPayload,
  TokenClaims,
  TokenFailureReason,
  DecodeResult,
  IssuedToken,
} from './token-claims.interface';
export type { Session, AuthenticatedRequest } from './authenticated-request.interface';
