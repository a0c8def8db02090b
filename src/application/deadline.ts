import { TimeoutError } from './errors.js';

/** Longest delay setTimeout honours; larger values fire after 1 ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

/**
 * Absolute point in time by which a request's external calls must settle.
 * Created once per request and passed down to every store/cache call.
 */
export class Deadline {
  private constructor(
    private readonly expiresAt: number,
    private readonly clock: () => number
  ) {}

  static after(ms: number, clock: () => number = Date.now): Deadline {
    return new Deadline(clock() + ms, clock);
  }

  static none(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY, Date.now);
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }

  /** The earlier of this deadline and `ms` from now. */
  cappedAt(ms: number): Deadline {
    return Deadline.after(Math.min(this.remainingMs(), ms), this.clock);
  }
}

/**
 * Race `work` against the deadline. On expiry the returned promise rejects
 * with TimeoutError; `work` itself is not aborted and runs to completion.
 */
export async function withDeadline<T>(
  work: Promise<T>,
  deadline: Deadline,
  operation: string
): Promise<T> {
  const remaining = deadline.remainingMs();
  if (remaining === Number.POSITIVE_INFINITY) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(operation, remaining));
    }, Math.min(remaining, MAX_TIMER_MS));
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
