import { Duration, Effect, Schedule } from "effect"
import { isTransientSandboxError, type SandboxError } from "./errors"

/**
 * Retry schedule configuration options.
 *
 * The lifecycle layer never retries on its own; these helpers are for callers
 * that want to re-run a whole operation after a transient failure.
 */
export interface RetryConfig {
  /** Maximum number of attempts including the first one (default: 3) */
  maxAttempts?: number
  /** Initial delay between retries (default: 1 second) */
  initialDelay?: Duration.DurationInput
  /** Maximum delay between retries (default: 30 seconds) */
  maxDelay?: Duration.DurationInput
  /** Exponential backoff factor (default: 2) */
  factor?: number
}

const defaultRetryConfig: Required<RetryConfig> = {
  maxAttempts: 3,
  initialDelay: Duration.seconds(1),
  maxDelay: Duration.seconds(30),
  factor: 2,
}

/**
 * Creates a retry schedule for transient sandbox errors.
 *
 * Uses exponential backoff with jitter, capped at `maxDelay`.
 *
 * @example
 * ```ts
 * const handle = getOrStartSandbox("sbx-1").pipe(
 *   Effect.retry(retryTransient({ maxAttempts: 5 }))
 * )
 * ```
 */
export const retryTransient = (config: RetryConfig = {}) => {
  const { maxAttempts, initialDelay, maxDelay, factor } = { ...defaultRetryConfig, ...config }

  return Schedule.exponential(initialDelay, factor).pipe(
    Schedule.jittered,
    Schedule.union(Schedule.spaced(maxDelay)),
    Schedule.compose(Schedule.recurs(maxAttempts - 1)),
    Schedule.whileInput(isTransientSandboxError),
  )
}

/**
 * Wraps an effect with automatic retry for transient errors.
 *
 * @example
 * ```ts
 * const handle = withRetry(registry.getOrStartSandbox("sbx-1"), { maxAttempts: 5 })
 * ```
 */
export const withRetry = <A, R>(
  effect: Effect.Effect<A, SandboxError, R>,
  config?: RetryConfig,
): Effect.Effect<A, SandboxError, R> => Effect.retry(effect, retryTransient(config))
