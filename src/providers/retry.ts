// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

/**
 * Backoff helpers for the dispatcher's retry loop.
 */

export interface BackoffOptions {
  /** Initial delay in milliseconds */
  initialDelayMs: number;
  /** Maximum delay in milliseconds */
  maxDelayMs: number;
  /** Backoff multiplier */
  backoffMultiplier: number;
  /** Add random jitter to delays */
  jitter: boolean;
}

/**
 * Calculate delay with exponential backoff and optional jitter.
 * @param attempt - Zero-based index of the retry being scheduled
 */
export function calculateDelay(
  attempt: number,
  options: BackoffOptions,
  random: () => number = Math.random
): number {
  // Exponential backoff: initialDelay * multiplier^attempt
  let delay = options.initialDelayMs * Math.pow(options.backoffMultiplier, attempt);

  // Cap at max delay
  delay = Math.min(delay, options.maxDelayMs);

  // Add jitter (0-25% random variation)
  if (options.jitter) {
    delay += delay * 0.25 * random();
  }

  return Math.round(delay);
}

/**
 * Sleep for a given number of milliseconds.
 * Rejects with the signal's reason if it is aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
