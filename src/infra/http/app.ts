/**
 * Express application factory. Everything stateful is passed in, so tests
 * can build an app over in-process fakes.
 */

import express from 'express';
import cors from 'cors';
import type { AuthService } from '../../application/auth/authService.js';
import { Deadline, withDeadline } from '../../application/deadline.js';
import type { CacheMode } from '../../application/ports.js';
import type { TokenIssuer } from '../../domain/auth/token.js';
import type { InMemoryMetrics } from '../metrics.js';
import { createAuthRoutes } from './routes/auth.js';
import { createUserRoutes } from './routes/users.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler } from './middleware/errorHandler.js';
import { notFoundHandler } from './middleware/notFound.js';
import { createApiRateLimiter, createLoginRateLimiter } from './middleware/rateLimit.js';
import { requestMetrics } from './middleware/requestMetrics.js';

const HEALTH_CHECK_TIMEOUT_MS = 2000;

export interface AppDependencies {
  auth: AuthService;
  tokenIssuer: TokenIssuer;
  metrics: InMemoryMetrics;
  /** Resolves when the database answers; rejects otherwise. */
  checkDatabase: () => Promise<void>;
  cacheMode: CacheMode;
  eventsEnabled: boolean;
  requestTimeoutMs: number;
  allowedOrigins: string[];
  rateLimitPerMinute: number;
  loginRateLimitPerMinute: number;
}

export function createApp(deps: AppDependencies) {
  const app = express();

  app.use(
    cors({
      origin: deps.allowedOrigins.includes('*') ? '*' : deps.allowedOrigins,
    })
  );
  app.use(express.json());
  app.use(requestMetrics(deps.metrics));
  app.use(createApiRateLimiter(deps.rateLimitPerMinute));

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res, next) => {
    withDeadline(deps.checkDatabase(), Deadline.after(HEALTH_CHECK_TIMEOUT_MS), 'health check')
      .then(() => {
        res.status(200).json({
          status: 'ok',
          cache: deps.cacheMode,
          events: deps.eventsEnabled ? 'enabled' : 'disabled',
        });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      })
      .catch(next);
  });

  app.get('/metrics', (_req, res) => {
    res.status(200).json(deps.metrics.snapshot());
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  app.use(
    '/api/auth',
    createAuthRoutes(deps.auth, {
      requestTimeoutMs: deps.requestTimeoutMs,
      loginRateLimiter: createLoginRateLimiter(deps.loginRateLimitPerMinute),
    })
  );
  app.use(
    '/api/users',
    createUserRoutes(deps.auth, deps.tokenIssuer, { requestTimeoutMs: deps.requestTimeoutMs })
  );

  // 404 + error handling (keep last)
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
