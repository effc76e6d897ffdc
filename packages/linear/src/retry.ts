import type { RetryConfig } from './types.js'
import { isRetryableError, TrackerRetryExhaustedError } from './errors.js'

export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 10000,
  retryableStatusCodes: [429, 500, 502, 503, 504],
}

/** Exponential backoff for the given zero-based attempt, capped at maxDelayMs */
export function backoffDelay(attempt: number, config: Required<RetryConfig>): number {
  return Math.min(config.initialDelayMs * config.backoffMultiplier ** attempt, config.maxDelayMs)
}

/** One failed attempt of a tracker operation that will be tried again */
export interface TrackerBackoff {
  operation: string
  /** Zero-based number of the attempt that failed */
  attempt: number
  maxRetries: number
  delayMs: number
  error: Error
  /** The delay came from the tracker's Retry-After rather than backoff */
  rateLimited: boolean
}

export interface TrackerRetryPolicy {
  config: Required<RetryConfig>
  /** Rate-limit delay carried by an error, if any */
  retryAfterMs?: (error: unknown) => number | null
  onBackoff?: (backoff: TrackerBackoff) => void
  sleep?: (ms: number) => Promise<void>
}

const wait = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms))

/**
 * Run one tracker operation, retrying transient faults.
 *
 * An error that already carries an exhausted budget, or one that is not
 * retryable (missing issue, rejected input), is rethrown as-is. A transient
 * fault that outlives the budget becomes a TrackerRetryExhaustedError naming
 * the operation.
 */
export async function retryTrackerCall<T>(
  operation: string,
  fn: () => Promise<T>,
  policy: TrackerRetryPolicy
): Promise<T> {
  const { config } = policy
  const sleep = policy.sleep ?? wait

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof TrackerRetryExhaustedError || !isRetryableError(error, config.retryableStatusCodes)) {
        throw error
      }
      const cause = error instanceof Error ? error : new Error(String(error))
      if (attempt >= config.maxRetries) {
        throw new TrackerRetryExhaustedError(operation, attempt + 1, cause)
      }

      const retryAfter = policy.retryAfterMs?.(error) ?? null
      const delayMs = retryAfter ?? backoffDelay(attempt, config)
      policy.onBackoff?.({
        operation,
        attempt,
        maxRetries: config.maxRetries,
        delayMs,
        error: cause,
        rateLimited: retryAfter !== null,
      })
      await sleep(delayMs)
    }
  }
}
