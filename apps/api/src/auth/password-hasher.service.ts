import { Inject, Injectable, Logger } from '@nestjs/common';
import type { ConfigType } from '@nestjs/config';
import * as bcrypt from 'bcrypt';
import { authConfig } from '../config/auth.config';

/**
 * PasswordHasher — salted, deliberately slow one-way hashing via bcrypt.
 *
 * `verify` recomputes with the salt embedded in the stored hash and compares
 * in constant time (bcrypt.compare). Plaintext never leaves this class.
 */
@Injectable()
export class PasswordHasher {
  private readonly logger = new Logger(PasswordHasher.name);

  constructor(
    @Inject(authConfig.KEY)
    private readonly config: ConfigType<typeof authConfig>,
  ) {}

  async hash(plaintext: string): Promise<string> {
    return bcrypt.hash(plaintext, this.config.bcryptSaltRounds);
  }

  /**
   * A stored hash that bcrypt cannot parse (corrupted row, empty string)
   * verifies as false.
   */
  async verify(plaintext: string, hash: string): Promise<boolean> {
    if (!hash) {
      return false;
    }

    try {
      return await bcrypt.compare(plaintext, hash);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Stored password hash could not be verified: ${message}`);
      return false;
    }
  }
}
