import { vi } from 'vitest';
import { DuplicateEmailError } from '../application/errors.js';
import type { UserStore } from '../application/ports.js';
import type { CredentialRecord, NewUser, UserIdentity } from '../domain/auth/user.js';
import type { SharedCacheBackend } from '../infra/cache/sharedProfileCache.js';
import type { EventBus } from '../infra/events/redisEventBus.js';
import type { Logger } from '../infra/logger.js';

/**
 * In-memory UserStore with call counters and an optional injected failure.
 */
export class FakeUserStore implements UserStore {
  readonly calls = { createUser: 0, findByEmail: 0, findById: 0 };
  failWith: Error | null = null;
  private readonly records = new Map<number, CredentialRecord>();
  private nextId = 1;

  constructor(private readonly now: () => Date = () => new Date('2024-01-01T00:00:00.000Z')) {}

  async createUser(user: NewUser, passwordHash: string): Promise<UserIdentity> {
    this.calls.createUser++;
    this.throwIfFailing();
    for (const record of this.records.values()) {
      if (record.identity.email === user.email) {
        throw new DuplicateEmailError();
      }
    }
    const identity: UserIdentity = { id: this.nextId++, ...user, createdAt: this.now() };
    this.records.set(identity.id, { identity, passwordHash });
    return identity;
  }

  async findByEmail(email: string): Promise<CredentialRecord | null> {
    this.calls.findByEmail++;
    this.throwIfFailing();
    for (const record of this.records.values()) {
      if (record.identity.email === email) {
        return record;
      }
    }
    return null;
  }

  async findById(id: number): Promise<UserIdentity | null> {
    this.calls.findById++;
    this.throwIfFailing();
    return this.records.get(id)?.identity ?? null;
  }

  storedHash(id: number): string | undefined {
    return this.records.get(id)?.passwordHash;
  }

  private throwIfFailing(): void {
    if (this.failWith) {
      throw this.failWith;
    }
  }
}

/**
 * Stand-in for a shared cache server: string values, TTL recorded but not
 * enforced.
 */
export class FakeCacheBackend implements SharedCacheBackend {
  readonly values = new Map<string, string>();
  readonly ttls = new Map<string, number>();
  failGet: Error | null = null;
  failSet: Error | null = null;
  failPing: Error | null = null;

  async get(key: string): Promise<string | null> {
    if (this.failGet) throw this.failGet;
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    if (this.failSet) throw this.failSet;
    this.values.set(key, value);
    this.ttls.set(key, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.values.delete(key);
    this.ttls.delete(key);
  }

  async ping(): Promise<void> {
    if (this.failPing) throw this.failPing;
  }
}

export class FakeEventBus implements EventBus {
  readonly published: Array<{ topic: string; message: string }> = [];
  failPublish: Error | null = null;
  failPing: Error | null = null;

  async publish(topic: string, message: string): Promise<void> {
    if (this.failPublish) throw this.failPublish;
    this.published.push({ topic, message });
  }

  async ping(): Promise<void> {
    if (this.failPing) throw this.failPing;
  }
}

export function createTestLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}

/** Cheap Argon2 parameters so tests don't spend seconds hashing. */
export const TEST_HASH_COST = { timeCost: 2, memoryCost: 4096, parallelism: 1 };
