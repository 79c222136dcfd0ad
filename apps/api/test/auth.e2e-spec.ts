import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { UserRole } from '@warden/database';
import { createTestApp } from './support/create-test-app';
import { InMemoryUserStore } from './support/in-memory-user-store';
import { ManualClock, MINUTE } from './support/manual-clock';
import { seedUser } from './support/test-config';

describe('Auth (e2e)', () => {
  let app: INestApplication;
  let userStore: InMemoryUserStore;
  let clock: ManualClock;

  beforeEach(async () => {
    ({ app, userStore, clock } = await createTestApp());
  });

  afterEach(async () => {
    await app.close();
  });

  async function login(email: string, password: string): Promise<string> {
    const res = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ email, password })
      .expect(200);
    return res.body.access_token;
  }

  it('registers, logs in, reads the profile and is locked out once deactivated', async () => {
    const registered = await request(app.getHttpServer())
      .post('/auth/register')
      .send({ username: 'a_user', email: 'a@x.com', password: 'Secur3!pass' })
      .expect(201);

    expect(registered.body).toMatchObject({
      id: 1,
      username: 'a_user',
      email: 'a@x.com',
      role: 'user',
      isActive: true,
      staffId: null,
    });
    expect(registered.body).not.toHaveProperty('password');
    expect(registered.body).not.toHaveProperty('passwordHash');

    const loginRes = await request(app.getHttpServer())
      .post('/auth/login')
      .send({ email: 'a@x.com', password: 'Secur3!pass' })
      .expect(200);

    expect(loginRes.body).toEqual({
      access_token: expect.any(String),
      token_type: 'bearer',
      expires_in: 1800,
    });

    const me = await request(app.getHttpServer())
      .get('/auth/me')
      .set('Authorization', `Bearer ${loginRes.body.access_token}`)
      .expect(200);

    expect(me.body).toMatchObject({ id: 1, email: 'a@x.com', role: 'user' });

    await request(app.getHttpServer())
      .post('/auth/login')
      .send({ email: 'a@x.com', password: 'wrong-password' })
      .expect(401)
      .expect((res) => {
        expect(res.body.message).toBe('Incorrect email or password');
      });

    await userStore.update(1, { isActive: false });

    const locked = await request(app.getHttpServer())
      .get('/auth/me')
      .set('Authorization', `Bearer ${loginRes.body.access_token}`)
      .expect(403);

    expect(locked.body).toEqual({
      statusCode: 403,
      error: 'Forbidden',
      message: 'Inactive user',
    });
  });

  describe('POST /auth/register', () => {
    it('stores the email lower-cased', async () => {
      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'mixed', email: 'Mixed@X.com', password: 'Secur3!pass' })
        .expect(201);

      expect(res.body.email).toBe('mixed@x.com');
      await expect(userStore.findByEmail('mixed@x.com')).resolves.not.toBeNull();
    });

    it('rejects a taken email with 409', async () => {
      await seedUser(userStore, {
        username: 'first',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'second', email: 'A@x.com', password: 'Secur3!pass' })
        .expect(409);

      expect(res.body.message).toBe('Email already registered');
    });

    it('rejects a taken username with 409', async () => {
      await seedUser(userStore, {
        username: 'first',
        email: 'a@x.com',
        password: 'Secur3!pass',
      });

      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'first', email: 'b@x.com', password: 'Secur3!pass' })
        .expect(409);

      expect(res.body.message).toBe('Username already registered');
    });

    it('rejects an invalid email with 422', async () => {
      const res = await request(app.getHttpServer())
        .post('/auth/register')
        .send({ username: 'someone', email: 'not-an-email', password: 'Secur3!pass' })
        .expect(422);

      expect(res.body.errors).toEqual([
        { field: 'email', messages: ['Please provide a valid email address'] },
      ]);
    });

    it('does not let a caller choose their role', async () => {
      await request(app.getHttpServer())
        .post('/auth/register')
        .send({
          username: 'sneaky',
          email: 's@x.com',
          password: 'Secur3!pass',
          role: 'admin',
        })
        .expect(422);

      await expect(userStore.list()).resolves.toEqual([]);
    });
  });

  describe('POST /auth/login', () => {
    beforeEach(async () => {
      await seedUser(userStore, {
        username: 'alice',
        email: 'alice@x.com',
        password: 'Secur3!pass',
        role: UserRole.ADMIN,
      });
    });

    it('accepts a form-encoded body', async () => {
      const res = await request(app.getHttpServer())
        .post('/auth/login')
        .type('form')
        .send({ email: 'alice@x.com', password: 'Secur3!pass' })
        .expect(200);

      expect(res.body.token_type).toBe('bearer');
    });

    it('matches the email case-insensitively', async () => {
      await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'ALICE@x.com', password: 'Secur3!pass' })
        .expect(200);
    });

    it('answers an unknown email exactly like a wrong password', async () => {
      const unknown = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'nobody@x.com', password: 'Secur3!pass' })
        .expect(401);
      const wrong = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'alice@x.com', password: 'not-the-password' })
        .expect(401);

      expect(unknown.body).toEqual(wrong.body);
    });

    it('rejects an inactive account with 403 once the password matches', async () => {
      await seedUser(userStore, {
        username: 'charlie',
        email: 'charlie@x.com',
        password: 'Secur3!pass',
        isActive: false,
      });

      await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'charlie@x.com', password: 'wrong-password' })
        .expect(401);

      const res = await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'charlie@x.com', password: 'Secur3!pass' })
        .expect(403);

      expect(res.body.message).toBe('Inactive user');
    });

    it('rejects a malformed email with 422', async () => {
      await request(app.getHttpServer())
        .post('/auth/login')
        .send({ email: 'alice', password: 'Secur3!pass' })
        .expect(422);
    });
  });

  describe('GET /auth/me', () => {
    let token: string;

    beforeEach(async () => {
      await seedUser(userStore, {
        username: 'bob',
        email: 'bob@x.com',
        password: 'Secur3!pass',
      });
      token = await login('bob@x.com', 'Secur3!pass');
    });

    it('requires a token', async () => {
      const res = await request(app.getHttpServer()).get('/auth/me').expect(401);

      expect(res.body).toEqual({
        statusCode: 401,
        error: 'Unauthorized',
        message: 'Could not validate credentials',
      });
    });

    it.each([
      ['a garbage token', 'Bearer invalid_token_here'],
      ['a non-bearer scheme', 'InvalidFormat token'],
    ])('rejects %s', async (_label, header) => {
      await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', header)
        .expect(401);
    });

    it('rejects a token signed with another key', async () => {
      const [header, payload] = token.split('.');
      const forged = `${header}.${payload}.c2lnbmF0dXJlLWZyb20tZWxzZXdoZXJl`;

      await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', `Bearer ${forged}`)
        .expect(401);
    });

    it('accepts a token until it expires', async () => {
      clock.advance(30 * MINUTE - 1000);
      await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      clock.advance(1000);
      await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(401);
    });

    it('rejects a token whose user no longer exists', async () => {
      userStore.remove(1);

      await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(401);
    });

    it('reflects role changes made after the token was issued', async () => {
      await userStore.update(1, { role: UserRole.ADMIN });

      const res = await request(app.getHttpServer())
        .get('/auth/me')
        .set('Authorization', `Bearer ${token}`)
        .expect(200);

      expect(res.body.role).toBe('admin');
    });
  });
});
