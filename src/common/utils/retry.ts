import { ConcurrencyConflictException } from '../errors/settlement.errors';

export interface ConflictRetryOptions {
  maxAttempts: number;
  /** Called before each retry with the attempt number that just failed. */
  onRetry?: (attempt: number, error: ConcurrencyConflictException) => void;
}

/**
 * Re-runs `operation` while it fails with a concurrency conflict, up to
 * `maxAttempts` calls in total. Every other error is rethrown immediately.
 */
export async function retryOnConflict<T>(operation: () => Promise<T>, options: ConflictRetryOptions): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof ConcurrencyConflictException) || attempt >= maxAttempts) {
        throw error;
      }
      options.onRetry?.(attempt, error);
    }
  }
}
