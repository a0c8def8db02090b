import { Deadline, withDeadline } from '../deadline.js';
import { DuplicateEmailError, PersistenceFailure, TimeoutError } from '../errors.js';

/**
 * Bound a UserStore call by the request deadline and normalise its failure:
 * duplicate email and timeouts pass through, anything else becomes a
 * PersistenceFailure.
 */
export async function callStore<T>(
  operation: string,
  work: Promise<T>,
  deadline: Deadline
): Promise<T> {
  try {
    return await withDeadline(work, deadline, `userStore.${operation}`);
  } catch (error) {
    if (
      error instanceof DuplicateEmailError ||
      error instanceof TimeoutError ||
      error instanceof PersistenceFailure
    ) {
      throw error;
    }
    throw new PersistenceFailure(operation, error);
  }
}
