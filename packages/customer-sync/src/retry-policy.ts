/**
 * Bounded retry around a single send. Transport failures and CRM rejections are
 * retried after a fixed delay; everything else fails on the first attempt.
 */
import { classifyError, isRetryable, type ItemError } from './errors';

export const MAX_RETRIES = 3;
export const RETRY_DELAY_MS = 2_000;

export interface RetryPolicy {
  maxRetries: number;
  retryDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: MAX_RETRIES,
  retryDelayMs: RETRY_DELAY_MS,
};

export type Sleep = (ms: number) => Promise<void>;

export async function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export interface RetryAttemptInfo {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  delayMs: number;
  error: ItemError;
}

export type RetryOutcome =
  | { status: 'delivered'; attempts: number }
  | { status: 'failed'; attempts: number; retriesExhausted: boolean; error: ItemError };

export interface RetryOptions {
  policy?: RetryPolicy;
  sleep?: Sleep;
  onRetry?: (info: RetryAttemptInfo) => void;
}

/**
 * Run `send` until it succeeds, fails with a non-retryable error, or has been
 * retried `maxRetries` times. Never rejects.
 */
export async function sendWithRetry(
  send: () => Promise<void>,
  options: RetryOptions = {}
): Promise<RetryOutcome> {
  const { maxRetries, retryDelayMs } = options.policy ?? DEFAULT_RETRY_POLICY;
  const wait = options.sleep ?? sleep;

  for (let retry = 0; ; retry++) {
    try {
      await send();
      return { status: 'delivered', attempts: retry + 1 };
    } catch (err) {
      const error = classifyError(err);
      if (!isRetryable(error)) {
        return { status: 'failed', attempts: retry + 1, retriesExhausted: false, error };
      }
      if (retry >= maxRetries) {
        return { status: 'failed', attempts: retry + 1, retriesExhausted: true, error };
      }
      options.onRetry?.({ attempt: retry + 1, delayMs: retryDelayMs, error });
      await wait(retryDelayMs);
    }
  }
}
