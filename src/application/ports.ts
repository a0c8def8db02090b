import type { CredentialRecord, NewUser, UserIdentity } from '../domain/auth/user.js';

/**
 * Persistence capability the auth use cases depend on.
 *
 * `createUser` rejects with DuplicateEmailError on a unique-email violation
 * and PersistenceFailure for anything else. Lookups resolve null when the
 * user does not exist.
 */
export interface UserStore {
  createUser(user: NewUser, passwordHash: string): Promise<UserIdentity>;
  findByEmail(email: string): Promise<CredentialRecord | null>;
  findById(id: number): Promise<UserIdentity | null>;
}

export type CacheMode = 'shared' | 'degraded';

export type CacheLookup =
  | { found: true; value: UserIdentity }
  | { found: false };

/**
 * Read-through profile cache. Which tier backs it is decided once at
 * start-up; callers never see the difference.
 */
export interface ProfileCache {
  readonly mode: CacheMode;
  get(key: string): Promise<CacheLookup>;
  put(key: string, value: UserIdentity): Promise<void>;
  invalidate(key: string): Promise<void>;
}

export type EventPayload = Record<string, unknown>;

/**
 * Best-effort domain event publication. `dispatch` starts the publish as an
 * independent unit of work and returns immediately.
 */
export interface EventNotifier {
  readonly enabled: boolean;
  dispatch(topic: string, payload: EventPayload): void;
}

export type MetricLabels = Record<string, string>;

export interface Metrics {
  increment(name: string, labels?: MetricLabels): void;
  observe(name: string, value: number, labels?: MetricLabels): void;
}
