import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createAuthService } from '../../../application/auth/authService.js';
import type { UserStore } from '../../../application/ports.js';
import { PasswordHasher } from '../../../domain/auth/password.js';
import { TokenIssuer } from '../../../domain/auth/token.js';
import { MemoryProfileCache } from '../../cache/memoryProfileCache.js';
import { Notifier } from '../../events/notifier.js';
import { InMemoryMetrics } from '../../metrics.js';
import {
  FakeEventBus,
  FakeUserStore,
  TEST_HASH_COST,
  createTestLogger,
} from '../../../test-utils/fakes.js';
import { createApp, type AppDependencies } from '../app.js';

const JWT_SECRET = 'test-secret';

const alice = {
  username: 'alice',
  email: 'alice@example.com',
  password: 'password123',
};

interface Harness {
  app: Express;
  store: FakeUserStore;
  bus: FakeEventBus;
  notifier: Notifier;
  metrics: InMemoryMetrics;
  tokenIssuer: TokenIssuer;
}

function buildApp(
  overrides: Partial<AppDependencies> = {},
  userStore?: UserStore
): Harness {
  const store = new FakeUserStore();
  const bus = new FakeEventBus();
  const logger = createTestLogger();
  const metrics = new InMemoryMetrics();
  const notifier = new Notifier(bus, logger, metrics);
  const tokenIssuer = new TokenIssuer(JWT_SECRET);
  const profileCache = new MemoryProfileCache(60_000);

  const auth = createAuthService({
    userStore: userStore ?? store,
    hasher: new PasswordHasher(TEST_HASH_COST),
    tokenIssuer,
    profileCache,
    notifier,
    tokenTtlSeconds: 3600,
    logger,
    metrics,
  });

  const app = createApp({
    auth,
    tokenIssuer,
    metrics,
    checkDatabase: async () => undefined,
    cacheMode: profileCache.mode,
    eventsEnabled: notifier.enabled,
    requestTimeoutMs: 5000,
    allowedOrigins: ['*'],
    rateLimitPerMinute: 1000,
    loginRateLimitPerMinute: 1000,
    ...overrides,
  });

  return { app, store, bus, notifier, metrics, tokenIssuer };
}

describe('HTTP API', () => {
  let h: Harness;

  beforeEach(() => {
    h = buildApp();
  });

  describe('POST /api/auth/register', () => {
    it('should create the user and return its public profile', async () => {
      const response = await request(h.app).post('/api/auth/register').send(alice);

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        id: 1,
        username: 'alice',
        email: 'alice@example.com',
        role: 'user',
        createdAt: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should publish a user.registered event', async () => {
      await request(h.app).post('/api/auth/register').send(alice);
      await h.notifier.drain();

      expect(h.bus.published).toEqual([
        { topic: 'user.registered', message: '{"id":1,"email":"alice@example.com"}' },
      ]);
    });

    it('should accept an explicit role', async () => {
      const response = await request(h.app)
        .post('/api/auth/register')
        .send({ ...alice, role: 'admin' });

      expect(response.status).toBe(201);
      expect(response.body.role).toBe('admin');
    });

    it('should reject a duplicate email with 409', async () => {
      await request(h.app).post('/api/auth/register').send(alice);

      const response = await request(h.app)
        .post('/api/auth/register')
        .send({ ...alice, username: 'alice2' });

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        code: 'DUPLICATE_EMAIL',
        message: 'User with this email already exists',
      });
    });

    it('should reject an invalid email', async () => {
      const response = await request(h.app)
        .post('/api/auth/register')
        .send({ ...alice, email: 'not-an-email' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('email');
    });

    it('should reject a weak password', async () => {
      const response = await request(h.app)
        .post('/api/auth/register')
        .send({ ...alice, password: 'short' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
      expect(response.body.details.issues[0].path).toBe('password');
      expect(h.store.calls.createUser).toBe(0);
    });

    it('should reject an unknown role', async () => {
      const response = await request(h.app)
        .post('/api/auth/register')
        .send({ ...alice, role: 'superuser' });

      expect(response.status).toBe(400);
      expect(response.body.details.issues[0].path).toBe('role');
    });

    it('should reject malformed JSON', async () => {
      const response = await request(h.app)
        .post('/api/auth/register')
        .set('Content-Type', 'application/json')
        .send('{"email":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ code: 'INVALID_JSON', message: 'Invalid JSON body' });
    });
  });

  describe('POST /api/auth/login', () => {
    beforeEach(async () => {
      await request(h.app).post('/api/auth/register').send(alice);
    });

    it('should return a token for the registered user', async () => {
      const response = await request(h.app)
        .post('/api/auth/login')
        .send({ email: alice.email, password: alice.password });

      expect(response.status).toBe(200);
      expect(Object.keys(response.body)).toEqual(['token']);
      expect(h.tokenIssuer.verify(response.body.token)).toEqual({ subject: 1, role: 'user' });
    });

    it('should answer unknown email and wrong password identically', async () => {
      const unknown = await request(h.app)
        .post('/api/auth/login')
        .send({ email: 'nobody@example.com', password: alice.password });
      const wrong = await request(h.app)
        .post('/api/auth/login')
        .send({ email: alice.email, password: 'password999' });

      expect(unknown.status).toBe(401);
      expect(wrong.status).toBe(401);
      expect(unknown.body).toEqual({
        code: 'INVALID_CREDENTIALS',
        message: 'Invalid email or password',
      });
      expect(wrong.body).toEqual(unknown.body);
    });

    it('should count login outcomes', async () => {
      await request(h.app)
        .post('/api/auth/login')
        .send({ email: alice.email, password: alice.password });
      await request(h.app)
        .post('/api/auth/login')
        .send({ email: alice.email, password: 'password999' });

      expect(h.metrics.snapshot().counters).toMatchObject({
        'auth_logins_total{outcome="success"}': 1,
        'auth_logins_total{outcome="invalid_credentials"}': 1,
      });
    });

    it('should rate limit login attempts', async () => {
      const limited = buildApp({ loginRateLimitPerMinute: 2 });
      const attempt = () =>
        request(limited.app)
          .post('/api/auth/login')
          .send({ email: 'nobody@example.com', password: 'password123' });

      expect((await attempt()).status).toBe(401);
      expect((await attempt()).status).toBe(401);
      const third = await attempt();

      expect(third.status).toBe(429);
      expect(third.body).toEqual({
        code: 'RATE_LIMITED',
        message: 'Too many login attempts, please try again later.',
      });
    });
  });

  describe('GET /api/users/:id', () => {
    let token: string;

    beforeEach(async () => {
      await request(h.app).post('/api/auth/register').send(alice);
      const login = await request(h.app)
        .post('/api/auth/login')
        .send({ email: alice.email, password: alice.password });
      token = login.body.token;
    });

    it('should return the profile for a valid token', async () => {
      const response = await request(h.app)
        .get('/api/users/1')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: 1,
        username: 'alice',
        email: 'alice@example.com',
        role: 'user',
        createdAt: '2024-01-01T00:00:00.000Z',
      });
    });

    it('should serve repeat reads from the cache', async () => {
      await request(h.app).get('/api/users/1').set('Authorization', `Bearer ${token}`);
      await request(h.app).get('/api/users/1').set('Authorization', `Bearer ${token}`);

      expect(h.store.calls.findById).toBe(1);
    });

    it('should require a bearer token', async () => {
      const response = await request(h.app).get('/api/users/1');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        code: 'UNAUTHORIZED',
        message: 'Missing or invalid authorization header',
      });
    });

    it('should reject a token signed with another secret', async () => {
      const forged = new TokenIssuer('other-secret').issue(1, 'admin', 3600);

      const response = await request(h.app)
        .get('/api/users/1')
        .set('Authorization', `Bearer ${forged}`);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    });

    it('should return 404 for an unknown user', async () => {
      const response = await request(h.app)
        .get('/api/users/99')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'USER_NOT_FOUND', message: 'User not found' });
    });

    it('should reject a non-numeric id', async () => {
      const response = await request(h.app)
        .get('/api/users/abc')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(400);
      expect(response.body.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('failures', () => {
    const token = new TokenIssuer(JWT_SECRET).issue(1, 'user', 3600);

    it('should answer 504 when the store misses the request deadline', async () => {
      const hanging: UserStore = {
        createUser: () => new Promise(() => undefined),
        findByEmail: () => new Promise(() => undefined),
        findById: () => new Promise(() => undefined),
      };
      const slow = buildApp({ requestTimeoutMs: 50 }, hanging);

      const response = await request(slow.app)
        .get('/api/users/1')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(504);
      expect(response.body).toEqual({ code: 'TIMEOUT', message: 'Request timed out' });
    });

    it('should hide store failures behind a 500', async () => {
      h.store.failWith = new Error('connection refused');

      const response = await request(h.app)
        .get('/api/users/1')
        .set('Authorization', `Bearer ${token}`);

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'INTERNAL_ERROR', message: 'Internal server error' });
    });

    it('should answer unknown API routes with a structured 404', async () => {
      const response = await request(h.app).get('/api/nope');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'Route GET /api/nope not found' });
    });
  });

  describe('operational endpoints', () => {
    it('should report health with the cache and event modes', async () => {
      const response = await request(h.app).get('/healthz');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ status: 'ok', cache: 'degraded', events: 'enabled' });
    });

    it('should report the database as unavailable', async () => {
      const down = buildApp({
        checkDatabase: async () => {
          throw new Error('ECONNREFUSED');
        },
      });

      const response = await request(down.app).get('/healthz');

      expect(response.status).toBe(500);
      expect(response.body).toEqual({ code: 'DB_UNAVAILABLE', message: 'Database unavailable' });
    });

    it('should expose metrics as JSON', async () => {
      const response = await request(h.app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('counters');
      expect(response.body).toHaveProperty('histograms');
    });
  });
});
