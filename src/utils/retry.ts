/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * retry.ts: Bounded retry with fixed or exponential delays for camloop.
 */
import { LOG } from "./logger.js";
import { delay } from "./delay.js";
import { formatError } from "./errors.js";

/* Some conditions are expected to clear up on their own: the storage mount appearing a few seconds after boot, for instance. The retry helper re-runs a check until it
 * succeeds or a bounded number of attempts has been used. Unlike the supervisor loop, which retries forever, everything that goes through here has a budget.
 */

/**
 * Options for retryOperation().
 */
export interface RetryOptions {

  // Growth factor applied to the delay after each failure. 1 keeps the delay fixed.
  backoffFactor?: number;

  // Delay in milliseconds before the second attempt.
  delayMs: number;

  // Human-readable description for logging purposes.
  description: string;

  // Maximum number of attempts before giving up.
  maxAttempts: number;

  // Upper bound for the delay between attempts.
  maxDelayMs?: number;

  // Aborting the signal ends the retries before the next attempt.
  signal?: AbortSignal;
}

/**
 * Calls an operation until it resolves or the attempt budget runs out. The delay between attempts starts at delayMs and is multiplied by backoffFactor after every
 * failure, capped at maxDelayMs.
 * @param operation - An async function to attempt, receiving the 1-based attempt number. Should throw on failure.
 * @param options - Retry options.
 * @returns The result of the first successful attempt.
 * @throws The last error encountered if all attempts fail, or an abort error if the signal fires first.
 */
export async function retryOperation<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {

  const factor = options.backoffFactor ?? 1;
  let lastError: unknown = new Error("No attempts were made for " + options.description + ".");
  let wait = options.delayMs;

  for(let attempt = 1; attempt <= options.maxAttempts; attempt++) {

    if(options.signal?.aborted) {

      throw new Error("Operation aborted: " + options.description + ".");
    }

    if(attempt > 1) {

      LOG.debug("retry", "Retrying %s (attempt %s of %s).", options.description, attempt, options.maxAttempts);
    }

    try {

      // eslint-disable-next-line no-await-in-loop
      return await operation(attempt);
    } catch(error) {

      lastError = error;

      LOG.debug("retry", "Attempt %s failed for %s: %s.", attempt, options.description, formatError(error));
    }

    if(attempt < options.maxAttempts) {

      // eslint-disable-next-line no-await-in-loop
      await delay(wait, options.signal);

      wait = Math.min(wait * factor, options.maxDelayMs ?? Number.POSITIVE_INFINITY);
    }
  }

  throw lastError;
}
