import { describe, it, expect, beforeAll, afterAll, beforeEach } from 'vitest';
import { DuplicateEmailError } from '../../../application/errors.js';
import { InMemoryMetrics } from '../../metrics.js';
import { createTestLogger } from '../../../test-utils/fakes.js';
import { migrate } from '../migrate.js';
import { createPool, type DbPool } from '../pool.js';
import { PgUserStore } from '../userRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PgUserStore', () => {
  let pool: DbPool;
  let metrics: InMemoryMetrics;
  let store: PgUserStore;

  beforeAll(async () => {
    pool = createPool(process.env.DATABASE_URL ?? '', createTestLogger());
    await migrate(pool);
  });

  afterAll(async () => {
    await pool.end();
  });

  beforeEach(async () => {
    await pool.query('TRUNCATE users RESTART IDENTITY');
    metrics = new InMemoryMetrics();
    store = new PgUserStore(pool, metrics);
  });

  it('should assign ids and round-trip identities', async () => {
    const created = await store.createUser(
      { username: 'alice', email: 'alice@example.com', role: 'user' },
      '$argon2id$placeholder'
    );

    expect(created.id).toBe(1);
    expect(created.createdAt).toBeInstanceOf(Date);
    await expect(store.findById(created.id)).resolves.toEqual(created);
    await expect(store.findByEmail('alice@example.com')).resolves.toEqual({
      identity: created,
      passwordHash: '$argon2id$placeholder',
    });
  });

  it('should resolve null for missing users', async () => {
    await expect(store.findById(42)).resolves.toBeNull();
    await expect(store.findByEmail('nobody@example.com')).resolves.toBeNull();
  });

  it('should map the unique email violation to DuplicateEmailError', async () => {
    await store.createUser({ username: 'alice', email: 'alice@example.com', role: 'user' }, 'h1');

    await expect(
      store.createUser({ username: 'alice2', email: 'alice@example.com', role: 'user' }, 'h2')
    ).rejects.toThrow(DuplicateEmailError);
  });

  it('should observe query durations per operation', async () => {
    await store.findById(1);

    expect(metrics.snapshot().histograms['db_query_duration_seconds{operation="findById"}']).toMatchObject({
      count: 1,
    });
  });
});
