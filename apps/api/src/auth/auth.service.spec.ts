import { JwtService } from '@nestjs/jwt';
import { UserRole } from '@warden/database';
import { AuthService } from './auth.service';
import { PasswordHasher } from './password-hasher.service';
import { TokenCodec } from './token-codec.service';
import {
  AccountInactiveException,
  EmailTakenException,
  InvalidCredentialsException,
  UsernameTakenException,
} from './exceptions';
import { UserConflictError } from '../users/user-store';
import { InMemoryUserStore } from '../../test/support/in-memory-user-store';
import { ManualClock } from '../../test/support/manual-clock';
import { TEST_AUTH_CONFIG, seedUser } from '../../test/support/test-config';

describe('AuthService', () => {
  let store: InMemoryUserStore;
  let hasher: PasswordHasher;
  let codec: TokenCodec;
  let service: AuthService;

  beforeEach(() => {
    store = new InMemoryUserStore();
    hasher = new PasswordHasher(TEST_AUTH_CONFIG);
    codec = new TokenCodec(
      new JwtService({}),
      TEST_AUTH_CONFIG,
      new ManualClock().read,
    );
    service = new AuthService(store, hasher, codec);
  });

  describe('register', () => {
    it('creates a user with the default role and returns a profile without the hash', async () => {
      const profile = await service.register({
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      expect(profile).toMatchObject({
        id: 1,
        username: 'alice',
        email: 'a@x.com',
        role: UserRole.USER,
        isActive: true,
        staffId: null,
      });
      expect(profile).not.toHaveProperty('passwordHash');
      expect(profile).not.toHaveProperty('password');
    });

    it('stores a bcrypt hash, not the password', async () => {
      await service.register({
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      const stored = await store.findByEmail('a@x.com');
      expect(stored?.passwordHash).not.toBe('Secur3!pass');
      await expect(
        hasher.verify('Secur3!pass', stored?.passwordHash ?? ''),
      ).resolves.toBe(true);
    });

    it('stores the email lower-cased', async () => {
      const profile = await service.register({
        username: 'alice',
        email: '  A@X.com ',
        password: 'Secur3!pass',
      });

      expect(profile.email).toBe('a@x.com');
    });

    it('rejects a taken username', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      await expect(
        service.register({
          username: 'alice',
          email: 'other@x.com',
          password: 'Secur3!pass',
        }),
      ).rejects.toBeInstanceOf(UsernameTakenException);
    });

    it('rejects a taken email regardless of case', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      await expect(
        service.register({
          username: 'alice2',
          email: 'A@X.COM',
          password: 'Secur3!pass',
        }),
      ).rejects.toBeInstanceOf(EmailTakenException);
    });

    it('maps a conflict raised by the store itself', async () => {
      jest
        .spyOn(store, 'create')
        .mockRejectedValueOnce(new UserConflictError('username'));

      await expect(
        service.register({
          username: 'alice',
          email: 'a@x.com',
          password: 'Secur3!pass',
        }),
      ).rejects.toBeInstanceOf(UsernameTakenException);
    });
  });

  describe('authenticate', () => {
    it('returns the stored user for correct credentials', async () => {
      const seeded = await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      const user = await service.authenticate('a@x.com', 'Secur3!pass');

      expect(user.id).toBe(seeded.id);
      expect(user.role).toBe(UserRole.USER);
    });

    it('matches the email case-insensitively', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      await expect(
        service.authenticate('A@x.COM', 'Secur3!pass'),
      ).resolves.toMatchObject({ email: 'a@x.com' });
    });

    it('fails an unknown email and a wrong password with the same error', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      const unknown = await service
        .authenticate('nobody@x.com', 'Secur3!pass')
        .catch((error: unknown) => error);
      const wrong = await service
        .authenticate('a@x.com', 'WrongPassword1!')
        .catch((error: unknown) => error);

      expect(unknown).toBeInstanceOf(InvalidCredentialsException);
      expect(wrong).toBeInstanceOf(InvalidCredentialsException);
      expect(unknown).toEqual(wrong);
    });

    it('reports a deactivated account once the password matches', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
        isActive: false,
      });

      await expect(
        service.authenticate('a@x.com', 'Secur3!pass'),
      ).rejects.toBeInstanceOf(AccountInactiveException);
    });

    it('does not reveal that an account is deactivated to a wrong password', async () => {
      await seedUser(store, {
        username: 'alice',
        email: 'a@x.com',
        password: 'Secur3!pass',
        isActive: false,
      });

      await expect(
        service.authenticate('a@x.com', 'WrongPassword1!'),
      ).rejects.toBeInstanceOf(InvalidCredentialsException);
    });
  });

  describe('login', () => {
    it('issues a bearer token whose subject is the email', async () => {
      const seeded = await seedUser(store, {
        username: 'admin',
        email: 'admin@x.com',
        password: 'Secur3!pass',
        role: UserRole.ADMIN,
      });

      const response = await service.login({
        email: 'admin@x.com',
        password: 'Secur3!pass',
      });

      expect(response.token_type).toBe('bearer');
      expect(response.expires_in).toBe(1800);

      const decoded = codec.decode(response.access_token);
      expect(decoded.ok && decoded.claims).toMatchObject({
        subject: 'admin@x.com',
        role: 'admin',
        userId: seeded.id,
      });
    });
  });
});
