import { Inject, Injectable, Logger } from '@nestjs/common';
import { USER_STORE, UserStore } from '../users/user-store';
import { CLOCK, type Clock } from './clock';
import { AccountInactiveException, UnauthenticatedException } from './exceptions';
import type { Session } from './interfaces';
import { TokenCodec } from './token-codec.service';

/**
 * SessionResolver — turns a bearer token into a live account.
 *
 * The token is only an identity pointer: after it decodes, the account is
 * re-read from the store so that deletion, deactivation and role changes
 * apply to tokens issued before them.
 */
@Injectable()
export class SessionResolver {
  private readonly logger = new Logger(SessionResolver.name);

  constructor(
    private readonly tokenCodec: TokenCodec,
    @Inject(USER_STORE)
    private readonly userStore: UserStore,
    @Inject(CLOCK)
    private readonly clock: Clock,
  ) {}

  /**
   * @throws UnauthenticatedException if the token does not decode or its user no longer exists
   * @throws AccountInactiveException if the user has been deactivated
   */
  async resolve(token: string): Promise<Session> {
    const decoded = this.tokenCodec.decode(token);
    if (!decoded.ok) {
      this.logger.debug(`Token rejected: ${decoded.reason}`);
      throw new UnauthenticatedException();
    }

    const { claims } = decoded;
    const user = await this.userStore.findByEmail(claims.subject);

    if (!user) {
      this.logger.warn(
        `Token validation failed: user ${claims.userId} no longer exists`,
      );
      throw new UnauthenticatedException();
    }

    if (!user.isActive) {
      this.logger.warn(
        `Token validation failed: user ${user.id} is deactivated`,
      );
      throw new AccountInactiveException();
    }

    return { user, validatedAt: new Date(this.clock()) };
  }
}
