import type { Server } from 'http';
import dotenv from 'dotenv';
import { createAuthService } from '../../application/auth/authService.js';
import { loadConfig } from '../../config.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { TokenIssuer } from '../../domain/auth/token.js';
import { createProfileCache } from '../cache/profileCache.js';
import { RedisCacheBackend } from '../cache/sharedProfileCache.js';
import { createPool } from '../db/pool.js';
import { PgUserStore } from '../db/userRepo.js';
import { createNotifier } from '../events/notifier.js';
import { RedisEventBus } from '../events/redisEventBus.js';
import { errorMessage, logger } from '../logger.js';
import { InMemoryMetrics } from '../metrics.js';
import { closeRedis, connectRedis, type RedisConnection } from '../redis.js';
import { createApp } from './app.js';

const SHUTDOWN_TIMEOUT_MS = 5000;

async function start(): Promise<void> {
  dotenv.config();
  const config = loadConfig();

  logger.setLevel(config.logLevel);
  if (config.invalidLogLevel) {
    logger.warn('Invalid log level, defaulting to info', { logLevel: config.invalidLogLevel });
  }

  const metrics = new InMemoryMetrics();
  const pool = createPool(config.databaseUrl, logger);
  const probe = { timeoutMs: config.backendProbeTimeoutMs, logger };

  const cacheClient = config.redisUrl ? await connectRedis(config.redisUrl, 'profile-cache', probe) : null;
  const busClient = config.eventBusUrl ? await connectRedis(config.eventBusUrl, 'event-bus', probe) : null;

  const profileCache = await createProfileCache({
    backend: cacheClient ? new RedisCacheBackend(cacheClient) : null,
    ttlSeconds: config.cacheTtlSeconds,
    probeTimeoutMs: config.backendProbeTimeoutMs,
    logger,
  });
  const notifier = await createNotifier({
    bus: busClient ? new RedisEventBus(busClient) : null,
    probeTimeoutMs: config.backendProbeTimeoutMs,
    logger,
    metrics,
  });

  const tokenIssuer = new TokenIssuer(config.jwtSecret);
  const auth = createAuthService({
    userStore: new PgUserStore(pool, metrics),
    hasher: new PasswordHasher(config.passwordHash),
    tokenIssuer,
    profileCache,
    notifier,
    tokenTtlSeconds: config.tokenTtlSeconds,
    cacheTimeoutMs: config.backendProbeTimeoutMs,
    logger,
    metrics,
  });

  const app = createApp({
    auth,
    tokenIssuer,
    metrics,
    checkDatabase: async () => {
      await pool.query('SELECT 1');
    },
    cacheMode: profileCache.mode,
    eventsEnabled: notifier.enabled,
    requestTimeoutMs: config.requestTimeoutMs,
    allowedOrigins: config.allowedOrigins,
    rateLimitPerMinute: config.rateLimitPerMinute,
    loginRateLimitPerMinute: config.loginRateLimitPerMinute,
  });

  const server = app.listen(config.port, () => {
    logger.info('Server running', {
      url: `http://localhost:${config.port}`,
      environment: config.environment,
      cache: profileCache.mode,
      events: notifier.enabled ? 'enabled' : 'disabled',
    });
  });

  const redisClients: Array<[RedisConnection, string]> = [];
  if (cacheClient) redisClients.push([cacheClient, 'profile-cache']);
  if (busClient) redisClients.push([busClient, 'event-bus']);

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info('Shutting down server...', { signal });

    const forced = setTimeout(() => {
      logger.error('Server forced to shutdown');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forced.unref();

    closeServer(server)
      .then(() => {
        logger.info('Draining domain events', { pending: notifier.pending });
        return notifier.drain();
      })
      .then(() => Promise.all(redisClients.map(([client, purpose]) => closeRedis(client, purpose, logger))))
      .then(() => pool.end())
      .then(() => {
        logger.info('Server exited');
      })
      .catch((err: unknown) => {
        logger.error('Error during shutdown', { error: errorMessage(err) });
        process.exitCode = 1;
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

start().catch((err: unknown) => {
  logger.error('Server failed to start', err instanceof Error ? err : { error: String(err) });
  process.exit(1);
});
