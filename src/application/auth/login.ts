import { VerificationFailure } from '../../domain/auth/errors.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { TokenIssuer } from '../../domain/auth/token.js';
import type { CredentialRecord } from '../../domain/auth/user.js';
import { type Logger, logger as defaultLogger } from '../../infra/logger.js';
import { noopMetrics } from '../../infra/metrics.js';
import { Deadline } from '../deadline.js';
import { InvalidCredentialsError } from '../errors.js';
import type { Metrics, UserStore } from '../ports.js';
import { callStore } from './storeCall.js';

// Verified against when the email is unknown
const DUMMY_PASSWORD = 'dummy-password-for-unknown-accounts';

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
}

export class LoginUseCase {
  private dummyHash: Promise<string> | null = null;

  constructor(
    private userStore: UserStore,
    private hasher: PasswordHasher,
    private tokenIssuer: TokenIssuer,
    private tokenTtlSeconds: number,
    private logger: Logger = defaultLogger,
    private metrics: Metrics = noopMetrics
  ) {}

  async execute(
    command: LoginCommand,
    deadline: Deadline = Deadline.none()
  ): Promise<LoginResult> {
    // Find user
    const record = await callStore(
      'findByEmail',
      this.userStore.findByEmail(command.email),
      deadline
    );
    if (!record) {
      // Same argon2 cost as the wrong-password path
      await this.verifyAgainstDummy(command.password);
      throw this.reject();
    }

    // Verify password
    const isValid = await this.checkPassword(command.password, record);
    if (!isValid) {
      throw this.reject();
    }

    const token = this.tokenIssuer.issue(
      record.identity.id,
      record.identity.role,
      this.tokenTtlSeconds
    );
    this.metrics.increment('auth_logins_total', { outcome: 'success' });

    return { token };
  }

  private async checkPassword(
    password: string,
    record: CredentialRecord
  ): Promise<boolean> {
    try {
      return await this.hasher.verify(password, record.passwordHash);
    } catch (error) {
      if (error instanceof VerificationFailure) {
        this.logger.warn('Stored password hash is malformed', {
          userId: record.identity.id,
        });
        return false;
      }
      throw error;
    }
  }

  private async verifyAgainstDummy(password: string): Promise<void> {
    if (!this.dummyHash) {
      this.dummyHash = this.hasher.hash(DUMMY_PASSWORD).catch((error: unknown) => {
        this.dummyHash = null;
        throw error;
      });
    }
    await this.hasher.verify(password, await this.dummyHash);
  }

  private reject(): InvalidCredentialsError {
    this.metrics.increment('auth_logins_total', { outcome: 'invalid_credentials' });
    return new InvalidCredentialsError();
  }
}
