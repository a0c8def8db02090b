import { profileCacheKey, type UserIdentity } from '../../domain/auth/user.js';
import { errorMessage, type Logger, logger as defaultLogger } from '../../infra/logger.js';
import { noopMetrics } from '../../infra/metrics.js';
import { Deadline, withDeadline } from '../deadline.js';
import { UserNotFoundError } from '../errors.js';
import type { CacheLookup, Metrics, ProfileCache, UserStore } from '../ports.js';
import { callStore } from './storeCall.js';

export const DEFAULT_CACHE_TIMEOUT_MS = 500;

/**
 * Read-through profile lookup. Cache errors never reach the caller: a failed
 * read is a miss and a failed write is only logged.
 */
export class GetProfileUseCase {
  constructor(
    private userStore: UserStore,
    private profileCache: ProfileCache,
    private logger: Logger = defaultLogger,
    private metrics: Metrics = noopMetrics,
    private cacheTimeoutMs: number = DEFAULT_CACHE_TIMEOUT_MS
  ) {}

  async execute(
    userId: number,
    deadline: Deadline = Deadline.none()
  ): Promise<UserIdentity> {
    const key = profileCacheKey(userId);

    const cached = await this.lookup(key, deadline);
    if (cached.found) {
      this.countLookup('hit');
      return cached.value;
    }
    this.countLookup('miss');

    const user = await callStore('findById', this.userStore.findById(userId), deadline);
    if (!user) {
      throw new UserNotFoundError(userId);
    }

    this.populate(key, user);
    return user;
  }

  private async lookup(key: string, deadline: Deadline): Promise<CacheLookup> {
    try {
      // A stalled cache gives up its own budget, not the request's
      return await withDeadline(
        this.profileCache.get(key),
        deadline.cappedAt(this.cacheTimeoutMs),
        'profileCache.get'
      );
    } catch (error) {
      this.metrics.increment('profile_cache_errors_total', { operation: 'get' });
      this.logger.warn('Profile cache read failed, falling through to store', {
        key,
        mode: this.profileCache.mode,
        error: errorMessage(error),
      });
      return { found: false };
    }
  }

  private populate(key: string, user: UserIdentity): void {
    void this.profileCache.put(key, user).catch((error: unknown) => {
      this.metrics.increment('profile_cache_errors_total', { operation: 'put' });
      this.logger.warn('Profile cache write failed', {
        key,
        mode: this.profileCache.mode,
        error: errorMessage(error),
      });
    });
  }

  private countLookup(result: 'hit' | 'miss'): void {
    this.metrics.increment('profile_cache_lookups_total', {
      result,
      mode: this.profileCache.mode,
    });
  }
}
