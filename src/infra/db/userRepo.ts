import pg from 'pg';
import type { CredentialRecord, NewUser, UserIdentity } from '../../domain/auth/user.js';
import { DuplicateEmailError, PersistenceFailure } from '../../application/errors.js';
import type { Metrics, UserStore } from '../../application/ports.js';
import { noopMetrics } from '../metrics.js';
import type { DbPool } from './pool.js';

const UNIQUE_VIOLATION = '23505';

interface UserRow {
  id: number;
  username: string;
  email: string;
  role: string;
  created_at: Date;
}

interface UserRowWithHash extends UserRow {
  password_hash: string;
}

function toIdentity(row: UserRow): UserIdentity {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    role: row.role,
    createdAt: row.created_at,
  };
}

export class PgUserStore implements UserStore {
  constructor(
    private readonly pool: DbPool,
    private readonly metrics: Metrics = noopMetrics
  ) {}

  async createUser(user: NewUser, passwordHash: string): Promise<UserIdentity> {
    const result = await this.timed('createUser', () =>
      this.pool.query<UserRow>(
        `INSERT INTO users (username, email, password_hash, role)
         VALUES ($1, $2, $3, $4)
         RETURNING id, username, email, role, created_at`,
        [user.username, user.email, passwordHash, user.role]
      )
    );

    return toIdentity(result.rows[0]);
  }

  async findByEmail(email: string): Promise<CredentialRecord | null> {
    const result = await this.timed('findByEmail', () =>
      this.pool.query<UserRowWithHash>(
        `SELECT id, username, email, password_hash, role, created_at
         FROM users WHERE email = $1`,
        [email]
      )
    );

    if (result.rows.length === 0) {
      return null;
    }

    const row = result.rows[0];
    return { identity: toIdentity(row), passwordHash: row.password_hash };
  }

  async findById(id: number): Promise<UserIdentity | null> {
    const result = await this.timed('findById', () =>
      this.pool.query<UserRow>(
        'SELECT id, username, email, role, created_at FROM users WHERE id = $1',
        [id]
      )
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toIdentity(result.rows[0]);
  }

  private async timed<T>(operation: string, query: () => Promise<T>): Promise<T> {
    const start = performance.now();
    try {
      return await query();
    } catch (error) {
      if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new DuplicateEmailError();
      }
      throw new PersistenceFailure(operation, error);
    } finally {
      this.metrics.observe('db_query_duration_seconds', (performance.now() - start) / 1000, {
        operation,
      });
    }
  }
}
