export class DomainError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EmptyCredentialError extends DomainError {
  constructor(message = 'Password is required') {
    super(message);
  }
}

export class HashingFailure extends DomainError {
  constructor(cause?: unknown) {
    super('Password hashing failed', { cause });
  }
}

/**
 * Stored hash could not be parsed. The message is deliberately the same
 * whichever input was at fault.
 */
export class VerificationFailure extends DomainError {
  constructor() {
    super('Credential verification failed');
  }
}

export class TokenInvalidError extends DomainError {
  constructor(message = 'Invalid or expired token') {
    super(message);
  }
}
