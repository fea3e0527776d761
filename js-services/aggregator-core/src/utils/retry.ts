import { ModelInvocationError } from '../errors';

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export type Sleep = (ms: number) => Promise<void>;

export const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

/**
 * Only model failures flagged transient are worth another attempt
 */
export function isRetryable(error: unknown): boolean {
  return error instanceof ModelInvocationError && error.kind === 'transient';
}

/**
 * Exponential backoff: base, 2x base, 4x base ... capped at maxDelayMs
 */
export function backoffDelay(retryNumber: number, opts: RetryOptions): number {
  return Math.min(opts.baseDelayMs * 2 ** retryNumber, opts.maxDelayMs);
}

/**
 * Run `fn` until it succeeds, fails permanently or runs out of retries.
 * Never throws; the outcome says how many attempts were made.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions & {
    sleep?: Sleep;
    signal?: AbortSignal;
    onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  }
): Promise<RetryResult<T>> {
  const sleep = opts.sleep ?? defaultSleep;
  let attempts = 0;

  for (;;) {
    attempts++;
    try {
      const value = await fn(attempts);
      return { ok: true, value, attempts };
    } catch (error) {
      const retriesUsed = attempts - 1;
      if (!isRetryable(error) || retriesUsed >= opts.maxRetries || opts.signal?.aborted) {
        return { ok: false, error, attempts };
      }

      const delayMs = backoffDelay(retriesUsed, opts);
      opts.onRetry?.(error, attempts, delayMs);
      await sleep(delayMs);
    }
  }
}
