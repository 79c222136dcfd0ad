import type { Request } from 'express';
import type { User } from '@warden/database';

/**
 * A user resolved from a bearer token, with the instant it was checked
 * against the store. Rebuilt on every request, never persisted.
 */
export interface Session {
  user: User;
  validatedAt: Date;
}

/**
 * Express Request after the SessionGuard ran.
 *
 * `auth` is undefined on public routes (no policy, no resolution), null on
 * optional routes reached anonymously, and a Session otherwise.
 */
export interface AuthenticatedRequest extends Request {
  auth?: Session | null;
}
