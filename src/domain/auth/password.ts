import { argon2id, hash, verify } from 'argon2';
import { HashingFailure, VerificationFailure } from './errors.js';

export interface PasswordHashCost {
  /** Iterations over memory. */
  timeCost: number;
  /** Memory in KiB. */
  memoryCost: number;
  parallelism: number;
}

export const DEFAULT_HASH_COST: PasswordHashCost = {
  timeCost: 3,
  memoryCost: 65536,
  parallelism: 4,
};

/**
 * Password hashing using Argon2id. Salted per hash; the cost is fixed for
 * the lifetime of the hasher and only changes with a redeploy.
 */
export class PasswordHasher {
  private readonly cost: Readonly<PasswordHashCost>;

  constructor(cost: Partial<PasswordHashCost> = {}) {
    this.cost = Object.freeze({ ...DEFAULT_HASH_COST, ...cost });
  }

  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    try {
      return await hash(plainPassword, { type: argon2id, ...this.cost });
    } catch (error) {
      throw new HashingFailure(error);
    }
  }

  /**
   * Verify a plain password against a stored hash.
   * Resolves false on mismatch; rejects only when the hash is malformed.
   */
  async verify(plainPassword: string, passwordHash: string): Promise<boolean> {
    if (!passwordHash.startsWith('$argon2')) {
      throw new VerificationFailure();
    }
    try {
      return await verify(passwordHash, plainPassword);
    } catch {
      throw new VerificationFailure();
    }
  }
}
