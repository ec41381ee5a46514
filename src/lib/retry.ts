/**
 * @fileoverview Fixed-Delay Retry
 *
 * Runs an async operation up to `maxAttempts` times, sleeping a constant
 * delay between attempts. There is no backoff and no sleep after the last
 * attempt.
 *
 * @module lib/retry
 */

import { RetriesExhaustedError, errorMessage } from "./errors"

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

export interface RetryOptions {
  /** Total attempts, including the first one. At least 1. */
  maxAttempts: number
  /** Pause between two attempts */
  delayMs?: number
  /** Used in the RetriesExhaustedError message */
  label?: string
  /** Errors for which this returns false are rethrown at once. Defaults to retrying everything. */
  shouldRetry?: (error: unknown) => boolean
  /** Called after every retriable failure, the last one included */
  onAttemptFailed?: (error: unknown, attempt: number) => void
}

/**
 * Retry `fn` with a fixed delay.
 *
 * @throws RetriesExhaustedError once every attempt failed; its `cause` is the last failure
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, delayMs = 0, label = "operation" } = options
  const shouldRetry = options.shouldRetry ?? (() => true)
  let lastError: unknown

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt)
    } catch (error) {
      if (!shouldRetry(error)) throw error
      lastError = error
      options.onAttemptFailed?.(error, attempt)
      if (attempt < maxAttempts && delayMs > 0) {
        await sleep(delayMs)
      }
    }
  }

  throw new RetriesExhaustedError(
    `${label} failed after ${maxAttempts} attempt(s): ${errorMessage(lastError)}`,
    maxAttempts,
    lastError
  )
}
