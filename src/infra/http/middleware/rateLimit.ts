import rateLimit from 'express-rate-limit';

const ONE_MINUTE_MS = 60 * 1000;

/**
 * General API rate limiter, per client IP.
 * Uses the in-memory store (resets on server restart).
 */
export function createApiRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: ONE_MINUTE_MS,
    limit: limitPerMinute,
    message: { code: 'RATE_LIMITED', message: 'Too many requests, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}

/**
 * Stricter limiter for the login endpoint.
 */
export function createLoginRateLimiter(limitPerMinute: number) {
  return rateLimit({
    windowMs: ONE_MINUTE_MS,
    limit: limitPerMinute,
    message: { code: 'RATE_LIMITED', message: 'Too many login attempts, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });
}
