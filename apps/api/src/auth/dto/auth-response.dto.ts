import type { IssuedToken } from '../interfaces';

/**
 * Response shape for a successful login.
 *
 * Follows the OAuth2 token response field names (`access_token`,
 * `token_type`, `expires_in`).
 */
export class AuthResponseDto {
  access_token: string;
  token_type: 'bearer';
  expires_in: number;

  constructor(issued: IssuedToken) {
    this.access_token = issued.token;
    this.token_type = 'bearer';
    this.expires_in = issued.expiresIn;
  }
}
