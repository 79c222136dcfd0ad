export {
  ACCESS_POLICY_KEY,
  Access,
  RequireAuthenticated,
  RequireRole,
  RequireAnyRole,
  OptionalAuth,
} from './access.decorator';
export { CurrentSession, CurrentUser } from './current-user.decorator';
