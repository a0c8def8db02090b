/**
 * Redis Connections
 * =================
 * Dedicated clients for the profile cache and the event bus.
 *
 * Notes:
 * - The start-up connect is bounded; a backend that isn't reachable in time
 *   yields null and the caller degrades.
 * - The offline queue is disabled so commands fail fast while reconnecting
 *   instead of waiting out the request deadline.
 */

import { createClient } from 'redis';
import { Deadline, withDeadline } from '../application/deadline.js';
import { errorMessage, type Logger } from './logger.js';

export type RedisConnection = ReturnType<typeof createClient>;

const MAX_RECONNECT_DELAY_MS = 2000;

export async function connectRedis(
  url: string,
  purpose: string,
  options: { timeoutMs: number; logger: Logger }
): Promise<RedisConnection | null> {
  const { logger } = options;
  const client = createClient({
    url,
    disableOfflineQueue: true,
    socket: {
      connectTimeout: options.timeoutMs,
      reconnectStrategy: (retries) => Math.min(retries * 100, MAX_RECONNECT_DELAY_MS),
    },
  });
  client.on('error', (err: unknown) => {
    logger.error('Redis client error', { purpose, error: errorMessage(err) });
  });
  client.on('reconnecting', () => {
    logger.warn('Redis reconnecting...', { purpose });
  });

  try {
    await withDeadline(client.connect(), Deadline.after(options.timeoutMs), `redis connect (${purpose})`);
    return client;
  } catch (err) {
    logger.warn('Redis unavailable', { purpose, error: errorMessage(err) });
    await closeRedis(client, purpose, logger);
    return null;
  }
}

export async function closeRedis(
  client: RedisConnection,
  purpose: string,
  logger: Logger
): Promise<void> {
  if (!client.isOpen) {
    return;
  }
  try {
    await client.disconnect();
  } catch (err) {
    logger.debug('Redis disconnect failed', { purpose, error: errorMessage(err) });
  }
}
