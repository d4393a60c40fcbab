/**
 * Bounded retry loop with exponential backoff
 *
 * The delay function is injectable so callers (and tests) decide how time passes.
 */

import {
  CancelledError,
  RateLimitError,
  RetriesExhaustedError,
  ServerError,
  toMcpError,
  type McpError,
} from '../lib/errors.js';
import { sleep as defaultSleep } from '../lib/utils.js';

/**
 * Waits `ms` milliseconds; must reject with CancelledError if `signal` aborts
 */
export type SleepFunction = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface BackoffOptions {
  /** Base delay in seconds: retry n waits factor * 2^(n-1) seconds */
  factorSeconds: number;
  /** Upper bound for any single delay, Retry-After included */
  maxDelayMs: number;
  /** Random extra delay as a fraction of the computed one (default 0.1) */
  jitterRatio?: number;
}

/**
 * Server-provided delay carried by a rate limit or 5xx error
 */
function retryAfterOf(error: McpError | undefined): number | undefined {
  if (error instanceof RateLimitError || error instanceof ServerError) {
    return error.retryAfterMs;
  }
  return undefined;
}

/**
 * Delay before retry number `retry` (1-based)
 *
 * @param random - Source of jitter in [0, 1)
 */
export function computeBackoffDelay(
  retry: number,
  error: McpError | undefined,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  const retryAfter = retryAfterOf(error);
  if (retryAfter !== undefined) {
    return Math.min(retryAfter, options.maxDelayMs);
  }

  const base = Math.min(options.maxDelayMs, options.factorSeconds * 1000 * 2 ** (retry - 1));
  const jitter = base * (options.jitterRatio ?? 0.1) * random();
  return Math.min(options.maxDelayMs, Math.round(base + jitter));
}

export interface RetryOptions {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before retry number `retry` (1-based) */
  delayFor: (retry: number, error: McpError) => number;
  /** Defaults to the error's `retriable` flag */
  shouldRetry?: (error: McpError) => boolean;
  sleep?: SleepFunction;
  signal?: AbortSignal;
  onRetry?: (retry: number, error: McpError, delayMs: number) => void;
}

/**
 * Run `operation` until it succeeds, fails with a non-retriable error, or
 * `maxRetries + 1` attempts have failed.
 *
 * @param operation - Receives the 1-based attempt number
 * @throws The non-retriable McpError as is, RetriesExhaustedError once attempts
 *   run out, or CancelledError if the signal aborts
 */
export async function withRetry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const maxAttempts = options.maxRetries + 1;
  const shouldRetry = options.shouldRetry ?? ((error: McpError) => error.retriable);
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; ; attempt++) {
    if (options.signal?.aborted) {
      throw new CancelledError(undefined, { cause: options.signal.reason });
    }

    try {
      return await operation(attempt);
    } catch (caught) {
      const error = toMcpError(caught);
      if (!shouldRetry(error)) {
        throw error;
      }
      if (attempt >= maxAttempts) {
        throw new RetriesExhaustedError(attempt, error);
      }

      const delayMs = options.delayFor(attempt, error);
      options.onRetry?.(attempt, error, delayMs);
      await sleep(delayMs, options.signal);
    }
  }
}
