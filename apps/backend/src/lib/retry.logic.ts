import { isConflictError } from "@/errors/access.errors"

/**
 * Retry logic for activation conflicts
 *
 * A caller that loses the per-key activation race (lock wait exceeded, or the
 * live-subscription unique index rejected its insert) gets a ConflictError.
 * Retrying after a short capped exponential backoff lets the winning writer
 * finish first.
 */

export const CONFLICT_RETRY_CONFIG = {
  /**
   * Delay in milliseconds before the first retry
   */
  baseDelayMs: 25,

  /**
   * Maximum delay cap in milliseconds
   */
  maxDelayMs: 1000,

  /**
   * 2^n growth: 25ms, 50ms, 100ms, 200ms, 400ms, 800ms, then capped at 1000ms
   */
  backoffMultiplier: 2,

  /**
   * Total attempts including the first one
   */
  maxAttempts: 5,
} as const

/**
 * Calculate retry delay using capped exponential backoff
 *
 * Formula: min(baseDelay * (multiplier^retry), maxDelay)
 *
 * @param retry - Zero-based retry number (0 = first retry)
 * @returns Delay in milliseconds before the next attempt
 */
export function calculateConflictRetryDelay(retry: number): number {
  const { baseDelayMs, backoffMultiplier, maxDelayMs } = CONFLICT_RETRY_CONFIG

  const exponentialDelay = baseDelayMs * backoffMultiplier ** retry

  return Math.min(exponentialDelay, maxDelayMs)
}

export interface ConflictRetryOptions {
  maxAttempts?: number
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Runs fn, retrying only on ConflictError. Any other error, or a conflict on
 * the last attempt, is rethrown unchanged.
 */
export async function withConflictRetry<T>(
  fn: () => Promise<T>,
  options: ConflictRetryOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? CONFLICT_RETRY_CONFIG.maxAttempts
  const sleep = options.sleep ?? defaultSleep

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (!isConflictError(error) || attempt >= maxAttempts) {
        throw error
      }
      await sleep(calculateConflictRetryDelay(attempt - 1))
    }
  }
}
