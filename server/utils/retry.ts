import { isTransientError, RateLimitError, toError } from './errors';
import { createLogger } from './logger';

const log = createLogger('retry');

export interface RetryOptions {
  /** Attempts after the first one. */
  maxRetries?: number;
  baseDelay?: number;
  maxDelay?: number;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (error: Error, attempt: number, delay: number) => void;
}

type Backoff = Required<Pick<RetryOptions, 'maxRetries' | 'baseDelay' | 'maxDelay'>>;

const DEFAULT_BACKOFF: Backoff = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 60000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Delay before the next attempt. Quota errors carry the server's
 * Retry-After (seconds); everything else doubles from `baseDelay` with up
 * to 10% jitter. Both are capped at `maxDelay`.
 */
export function delayFor(error: Error, attempt: number, backoff: Backoff): number {
  if (error instanceof RateLimitError && error.retryAfter !== undefined) {
    return Math.min(error.retryAfter * 1000, backoff.maxDelay);
  }
  const doubled = backoff.baseDelay * 2 ** (attempt - 1);
  return Math.min(doubled * (1 + Math.random() * 0.1), backoff.maxDelay);
}

function logRetry(error: Error, attempt: number, delay: number): void {
  log.warn('Attempt failed, retrying', {
    attempt,
    delayMs: Math.round(delay),
    error: error.message,
  });
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const backoff: Backoff = {
    maxRetries: options.maxRetries ?? DEFAULT_BACKOFF.maxRetries,
    baseDelay: options.baseDelay ?? DEFAULT_BACKOFF.baseDelay,
    maxDelay: options.maxDelay ?? DEFAULT_BACKOFF.maxDelay,
  };
  const shouldRetry = options.shouldRetry ?? isTransientError;
  const onRetry = options.onRetry ?? logRetry;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (caught) {
      const error = toError(caught);
      if (attempt > backoff.maxRetries || !shouldRetry(error)) throw error;

      const delay = delayFor(error, attempt, backoff);
      onRetry(error, attempt, delay);
      await sleep(delay);
    }
  }
}
