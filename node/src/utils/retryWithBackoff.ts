// Retry with exponential backoff and jitter
import { componentLogger } from '@/services/logger';
import { CancelledError } from './errors';
import { sleep } from './sleep';

const log = componentLogger('retry');

export interface RetryOptions {
  maxRetries?: number;
  initialDelay?: number;
  maxDelay?: number;
  jitter?: boolean;
  exponentialBase?: number;
  signal?: AbortSignal;
  label?: string;
}

/**
 * Retry function with exponential backoff and jitter. Cancellation is never
 * retried.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    maxRetries = 3,
    initialDelay = 100,
    maxDelay = 5000,
    jitter = true,
    exponentialBase = 2,
    signal,
    label = 'operation',
  } = options;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted || attempt >= maxRetries) {
        throw error;
      }

      const exponentialDelay = initialDelay * Math.pow(exponentialBase, attempt);
      // Add jitter (random 0-25% of delay)
      const jitterAmount = jitter ? Math.random() * 0.25 * exponentialDelay : 0;
      const delay = Math.min(exponentialDelay + jitterAmount, maxDelay);

      log.debug('retry:scheduled', { label, attempt: attempt + 1, maxRetries, delayMs: Math.round(delay) });
      await sleep(delay, signal);
    }
  }
}
