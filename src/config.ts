import { z } from 'zod';
import { MAX_TIMER_MS } from './application/deadline.js';
import { isLogLevel, type LogLevel } from './infra/logger.js';

export class ConfigurationError extends Error {
  constructor(readonly keys: string[]) {
    super(`Configuration error: invalid or missing ${keys.join(', ')}`);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const MAX_TIMER_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().positive().max(max).default(fallback);

const envSchema = z.object({
  DATABASE_URL: z.string(),
  JWT_SECRET: z.string(),
  PORT: positiveInt(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.string().default('info'),
  REQUEST_TIMEOUT_SECONDS: positiveInt(30, MAX_TIMER_SECONDS),
  REDIS_URL: z.string().optional(),
  EVENT_BUS_URL: z.string().optional(),
  BACKEND_PROBE_TIMEOUT_MS: positiveInt(2000, MAX_TIMER_MS),
  CACHE_TTL_SECONDS: positiveInt(300, MAX_TIMER_SECONDS),
  JWT_EXPIRY_HOURS: positiveInt(24),
  ALLOWED_ORIGINS: z.string().default('*'),
  RATE_LIMIT_PER_MINUTE: positiveInt(60),
  LOGIN_RATE_LIMIT_PER_MINUTE: positiveInt(10),
  PASSWORD_HASH_TIME_COST: positiveInt(3),
  PASSWORD_HASH_MEMORY_KIB: positiveInt(65536),
});

export interface AppConfig {
  databaseUrl: string;
  jwtSecret: string;
  port: number;
  environment: string;
  logLevel: LogLevel;
  /** Set when LOG_LEVEL was not a known level and `info` was used instead. */
  invalidLogLevel?: string;
  requestTimeoutMs: number;
  redisUrl: string | null;
  eventBusUrl: string | null;
  backendProbeTimeoutMs: number;
  cacheTtlSeconds: number;
  tokenTtlSeconds: number;
  allowedOrigins: string[];
  rateLimitPerMinute: number;
  loginRateLimitPerMinute: number;
  passwordHash: {
    timeCost: number;
    memoryCost: number;
  };
}

/**
 * Blank variables count as unset, so `REDIS_URL=` disables the shared cache.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    const trimmed = value?.trim();
    if (trimmed) {
      out[key] = trimmed;
    }
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const keys = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigurationError(keys);
  }
  const e = parsed.data;

  const logLevel = e.LOG_LEVEL.toLowerCase();
  const redisUrl = e.REDIS_URL ?? null;

  return {
    databaseUrl: e.DATABASE_URL,
    jwtSecret: e.JWT_SECRET,
    port: e.PORT,
    environment: e.NODE_ENV,
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
    invalidLogLevel: isLogLevel(logLevel) ? undefined : e.LOG_LEVEL,
    requestTimeoutMs: e.REQUEST_TIMEOUT_SECONDS * 1000,
    redisUrl,
    eventBusUrl: e.EVENT_BUS_URL ?? redisUrl,
    backendProbeTimeoutMs: e.BACKEND_PROBE_TIMEOUT_MS,
    cacheTtlSeconds: e.CACHE_TTL_SECONDS,
    tokenTtlSeconds: e.JWT_EXPIRY_HOURS * 60 * 60,
    allowedOrigins: e.ALLOWED_ORIGINS.split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
    rateLimitPerMinute: e.RATE_LIMIT_PER_MINUTE,
    loginRateLimitPerMinute: e.LOGIN_RATE_LIMIT_PER_MINUTE,
    passwordHash: {
      timeCost: e.PASSWORD_HASH_TIME_COST,
      memoryCost: e.PASSWORD_HASH_MEMORY_KIB,
    },
  };
}
