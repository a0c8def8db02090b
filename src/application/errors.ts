/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConflictError extends Error {
  constructor(message = 'Conflict') {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UserNotFoundError extends NotFoundError {
  constructor(readonly userId: number) {
    super('User not found');
    this.name = 'UserNotFoundError';
  }
}

/**
 * Unknown email and wrong password both surface as this error, with the
 * same message, so login responses cannot be used to enumerate accounts.
 */
export class InvalidCredentialsError extends UnauthorizedError {
  constructor() {
    super('Invalid email or password');
    this.name = 'InvalidCredentialsError';
  }
}

export class DuplicateEmailError extends ConflictError {
  constructor() {
    super('User with this email already exists');
    this.name = 'DuplicateEmailError';
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class PersistenceFailure extends Error {
  constructor(
    readonly operation: string,
    cause?: unknown
  ) {
    super(`User store ${operation} failed`, { cause });
    this.name = 'PersistenceFailure';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Never surfaced to callers: reads fall through to the store. */
export class CacheFailure extends Error {
  constructor(
    readonly operation: 'get' | 'put' | 'invalidate',
    readonly key: string,
    cause?: unknown
  ) {
    super(`Profile cache ${operation} failed for ${key}`, { cause });
    this.name = 'CacheFailure';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Never surfaced to callers: logged by the notifier. */
export class PublishFailure extends Error {
  constructor(
    readonly topic: string,
    cause?: unknown
  ) {
    super(`Publishing to ${topic} failed`, { cause });
    this.name = 'PublishFailure';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
