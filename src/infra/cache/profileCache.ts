import { Deadline, withDeadline } from '../../application/deadline.js';
import type { ProfileCache } from '../../application/ports.js';
import { errorMessage, type Logger } from '../logger.js';
import { MemoryProfileCache } from './memoryProfileCache.js';
import { SharedProfileCache, type SharedCacheBackend } from './sharedProfileCache.js';

export interface ProfileCacheOptions {
  /** Null when no shared backend is configured or it could not connect. */
  backend: SharedCacheBackend | null;
  ttlSeconds: number;
  probeTimeoutMs: number;
  logger: Logger;
  clock?: () => number;
}

/**
 * Pick the cache tier once, from a health probe of the shared backend.
 * The choice holds for the life of the process: a backend that recovers
 * later is only picked up on restart.
 */
export async function createProfileCache(options: ProfileCacheOptions): Promise<ProfileCache> {
  const { backend, ttlSeconds, logger } = options;
  const degraded = () => new MemoryProfileCache(ttlSeconds * 1000, options.clock);

  if (!backend) {
    logger.warn('Shared cache not configured, using in-process profile cache');
    return degraded();
  }

  try {
    await withDeadline(backend.ping(), Deadline.after(options.probeTimeoutMs), 'cache ping');
  } catch (error) {
    logger.warn('Shared cache unhealthy, using in-process profile cache', {
      error: errorMessage(error),
    });
    return degraded();
  }

  logger.info('Profile cache using shared backend', { ttlSeconds });
  return new SharedProfileCache(backend, ttlSeconds);
}
