import { z } from 'zod';
import type { UserIdentity } from '../../domain/auth/user.js';
import { CacheFailure } from '../../application/errors.js';
import type { CacheLookup, ProfileCache } from '../../application/ports.js';
import type { RedisConnection } from '../redis.js';

/**
 * Byte-level contract of a shared cache server with server-side TTL.
 */
export interface SharedCacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  ping(): Promise<void>;
}

export class RedisCacheBackend implements SharedCacheBackend {
  constructor(private readonly client: RedisConnection) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.client.set(key, value, { EX: ttlSeconds });
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async ping(): Promise<void> {
    await this.client.ping();
  }
}

const cachedUserSchema = z.object({
  id: z.number().int().positive(),
  username: z.string(),
  email: z.string(),
  role: z.string(),
  createdAt: z.coerce.date(),
});

/**
 * Shared-mode tier: JSON values in a cache server every process reads,
 * expired by the server. Backend errors surface as CacheFailure.
 */
export class SharedProfileCache implements ProfileCache {
  readonly mode = 'shared' as const;

  constructor(
    private readonly backend: SharedCacheBackend,
    private readonly ttlSeconds: number
  ) {}

  async get(key: string): Promise<CacheLookup> {
    let raw: string | null;
    try {
      raw = await this.backend.get(key);
    } catch (error) {
      throw new CacheFailure('get', key, error);
    }
    if (raw === null) {
      return { found: false };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new CacheFailure('get', key, error);
    }
    const result = cachedUserSchema.safeParse(parsed);
    if (!result.success) {
      throw new CacheFailure('get', key, result.error);
    }
    const value: UserIdentity = result.data;
    return { found: true, value };
  }

  async put(key: string, value: UserIdentity): Promise<void> {
    try {
      await this.backend.set(key, JSON.stringify(value), this.ttlSeconds);
    } catch (error) {
      throw new CacheFailure('put', key, error);
    }
  }

  async invalidate(key: string): Promise<void> {
    try {
      await this.backend.delete(key);
    } catch (error) {
      throw new CacheFailure('invalidate', key, error);
    }
  }
}
