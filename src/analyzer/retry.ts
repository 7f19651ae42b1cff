import { TransportError } from '../errors.js';

export const RETRY_DELAYS = [1000, 4000, 16000]; // exponential backoff
const RETRYABLE_STATUS = new Set([408, 409, 429, 500, 502, 503, 504]);

export interface RetryOptions {
  delays?: number[];
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (attempt: number, delay: number, status: number | undefined) => void;
}

export function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
}

/**
 * Transport failures are retried: connection errors and timeouts (no status)
 * and throttling or server-side statuses. Anything the provider rejected on
 * its merits (400, 401, 403, 404, 422) is not.
 */
export function isTransient(err: unknown): boolean {
  const status = statusOf(err);
  return status === undefined || RETRYABLE_STATUS.has(status);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const delays = options.delays ?? RETRY_DELAYS;
  const wait = options.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const status = statusOf(err);
      if (!isTransient(err) || attempt >= delays.length) {
        throw new TransportError(
          `${label} failed after ${attempt + 1} attempt(s). Status: ${status ?? 'unknown'}`,
          err,
        );
      }
      const delay = delays[attempt];
      options.onRetry?.(attempt + 1, delay, status);
      await wait(delay);
    }
  }
}
