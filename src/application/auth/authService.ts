import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenIssuer } from '../../domain/auth/token.js';
import { type Logger, logger as defaultLogger } from '../../infra/logger.js';
import { noopMetrics } from '../../infra/metrics.js';
import type { EventNotifier, Metrics, ProfileCache, UserStore } from '../ports.js';
import { GetProfileUseCase } from './getProfile.js';
import { LoginUseCase } from './login.js';
import { RegisterUseCase } from './register.js';

export interface AuthServiceDependencies {
  userStore: UserStore;
  hasher: PasswordHasher;
  tokenIssuer: TokenIssuer;
  profileCache: ProfileCache;
  notifier: EventNotifier;
  tokenTtlSeconds: number;
  /** Budget for a profile cache read before it counts as a miss. */
  cacheTimeoutMs?: number;
  logger?: Logger;
  metrics?: Metrics;
}

export interface AuthService {
  register: RegisterUseCase;
  login: LoginUseCase;
  getProfile: GetProfileUseCase;
}

export function createAuthService(deps: AuthServiceDependencies): AuthService {
  const logger = deps.logger ?? defaultLogger;
  const metrics = deps.metrics ?? noopMetrics;

  return {
    register: new RegisterUseCase(deps.userStore, deps.hasher, deps.notifier),
    login: new LoginUseCase(
      deps.userStore,
      deps.hasher,
      deps.tokenIssuer,
      deps.tokenTtlSeconds,
      logger,
      metrics
    ),
    getProfile: new GetProfileUseCase(
      deps.userStore,
      deps.profileCache,
      logger,
      metrics,
      deps.cacheTimeoutMs
    ),
  };
}
