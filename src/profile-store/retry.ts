/**
 * Bounded retry with a fixed delay between attempts
 */

import { AbortedError, RetryExhaustedError } from './errors';
import type { ProfileLogger } from './types';

export interface RetryOptions {
  attempts: number;
  delayMs: number;
  /** Used in log lines and the final error */
  label: string;
  signal?: AbortSignal;
  logger?: ProfileLogger;
}

/**
 * Sleep that rejects with AbortedError when the signal fires
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Run `operation` up to `attempts` times.
 * Throws RetryExhaustedError with the last failure as cause, or AbortedError.
 */
export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    if (options.signal?.aborted) {
      throw new AbortedError();
    }

    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (attempt < attempts) {
        options.logger?.warn(
          `[Retry] ${options.label} failed (attempt ${attempt}/${attempts}), retrying in ${options.delayMs}ms:`,
          error instanceof Error ? error.message : error
        );
        await sleep(options.delayMs, options.signal);
      }
    }
  }

  throw new RetryExhaustedError(options.label, attempts, lastError);
}
