/**
 * Public identity of a registered user.
 * Owned by the persistence layer; the rest of the service only ever holds
 * immutable copies.
 */
export interface UserIdentity {
  readonly id: number;
  readonly username: string;
  readonly email: string;
  readonly role: string;
  readonly createdAt: Date;
}

/**
 * Identity plus its password hash. Only crosses the store boundary on login
 * and is never cached, logged or returned to callers.
 */
export interface CredentialRecord {
  readonly identity: UserIdentity;
  readonly passwordHash: string;
}

export interface NewUser {
  username: string;
  email: string;
  role: string;
}

export const DEFAULT_ROLE = 'user';

export function profileCacheKey(userId: number): string {
  return `user:${userId}`;
}
