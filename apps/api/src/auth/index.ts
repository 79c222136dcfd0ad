// ── Module ──────────────────────────────────────────────────
export { AuthModule } from './auth.module';

// ── Core services ───────────────────────────────────────────
export { AuthService } from './auth.service';
export { PasswordHasher } from './password-hasher.service';
export { TokenCodec } from './token-codec.service';
export { SessionResolver } from './session-resolver.service';

// ── Policies, guard and decorators (for use in other feature modules) ──
export { Policies, authorize } from './access-policy';
export type { AccessPolicy, AccessDecision } from './access-policy';
export { SessionGuard } from './guards';
export {
  Access,
  RequireAuthenticated,
  RequireRole,
  RequireAnyRole,
  OptionalAuth,
  CurrentSession,
  CurrentUser,
} from './decorators';

// ── Interfaces ──────────────────────────────────────────────
export type {
  TokenClaims,
  DecodeResult,
  Session,
  AuthenticatedRequest,
} from './interfaces';

// ── DTOs ────────────────────────────────────────────────────
export { UserProfileDto } from './dto';
