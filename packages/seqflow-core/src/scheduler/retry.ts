/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { setTimeout as sleep } from 'timers/promises';
import { RetriesExhaustedError, TransientBackendError } from '../errors.js';

/**
 * Exponential backoff settings.
 */
export interface BackoffOptions {
  /** Total attempts including the first (default: 5) */
  attempts?: number;
  /** Delay before the second attempt in ms (default: 1000) */
  baseDelayMs?: number;
  /** Upper bound on any delay in ms (default: 30000) */
  maxDelayMs?: number;
}

export interface RetryOptions extends BackoffOptions {
  /** Aborts the wait between attempts */
  signal?: AbortSignal;
  /** Which errors are worth another attempt (default: TransientBackendError) */
  isRetryable?: (err: unknown) => boolean;
  /** Called before each wait */
  onRetry?: (attempt: number, delayMs: number, err: unknown) => void;
}

export const DEFAULT_BACKOFF: Required<BackoffOptions> = {
  attempts: 5,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
};

/**
 * Delay after the given failed attempt (1-based): base, 2x base, 4x base, ...
 * capped at `maxDelayMs`.
 */
export function backoffDelay(attempt: number, options: BackoffOptions = {}): number {
  const base = options.baseDelayMs ?? DEFAULT_BACKOFF.baseDelayMs;
  const max = options.maxDelayMs ?? DEFAULT_BACKOFF.maxDelayMs;
  return Math.min(max, base * 2 ** (attempt - 1));
}

/**
 * Run `fn`, retrying retryable failures with exponential backoff.
 *
 * Errors that are not retryable propagate at once.
 *
 * @param operation - Description used in the exhaustion error
 * @throws {RetriesExhaustedError} When every attempt failed with a retryable error
 */
export async function withRetry<T>(
  operation: string,
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_BACKOFF.attempts);
  const isRetryable =
    options.isRetryable ?? ((err: unknown) => err instanceof TransientBackendError);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isRetryable(err)) throw err;
      if (attempt >= attempts) {
        throw new RetriesExhaustedError(
          operation,
          attempts,
          err instanceof Error ? err : new Error(String(err))
        );
      }
      const delay = backoffDelay(attempt, options);
      options.onRetry?.(attempt, delay, err);
      await sleep(delay, undefined, { signal: options.signal });
    }
  }
}
