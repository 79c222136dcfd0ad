export { InvalidCredentialsException } from './invalid-credentials.exception';
export { AccountInactiveException } from './account-inactive.exception';
export { UnauthenticatedException } from './unauthenticated.exception';
export { InsufficientRoleException } from './insufficient-role.exception';
export { EmailTakenException } from './email-taken.exception';
export { UsernameTakenException } from './username-taken.exception';
