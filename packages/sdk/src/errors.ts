import { Data, Effect, Clock } from "effect"
import type { SandboxHandle } from "./types"

/**
 * Context for sandbox errors providing debugging and tracing information.
 * All fields are optional.
 */
export interface SandboxErrorContext {
  /** Provider name (e.g., "daytona", "e2b") */
  provider?: string
  /** Operation name (e.g., "getOrStartSandbox", "POST /sandbox") */
  operation?: string
  /** Sandbox ID involved in the operation */
  sandboxId?: string
  /** Timestamp when the error occurred (ISO string) */
  timestamp?: string
  /** Duration of the operation in milliseconds */
  durationMs?: number
}

/**
 * The selected backend cannot be constructed (missing or invalid credentials, bad settings).
 * Surfaced on the first lifecycle call, never masked.
 */
export class SandboxConfigurationError extends Data.TaggedError("SandboxConfiguration")<{
  message: string
  cause?: unknown
  context?: SandboxErrorContext
}> {}

/**
 * Error thrown when a sandbox does not exist remotely.
 */
export class SandboxNotFoundError extends Data.TaggedError("SandboxNotFound")<{
  id: string
  context?: SandboxErrorContext
}> {}

export type TransientReason = "network" | "timeout" | "rate-limit"

/**
 * The control plane is temporarily unreachable, slow or rate limiting.
 * Never retried by the lifecycle layer; callers may re-run the whole operation.
 */
export class SandboxTransientError extends Data.TaggedError("SandboxTransient")<{
  reason: TransientReason
  message?: string
  retryAfterMs?: number
  cause?: unknown
  context?: SandboxErrorContext
}> {}

/**
 * A creation request was rejected (quota, invalid image, auth failure).
 */
export class SandboxProvisioningError extends Data.TaggedError("SandboxProvisioning")<{
  message: string
  cause?: unknown
  context?: SandboxErrorContext
}> {}

/**
 * Error thrown when authentication or authorization fails.
 */
export class SandboxAuthError extends Data.TaggedError("SandboxAuth")<{
  message: string
  context?: SandboxErrorContext
}> {}

/**
 * Error thrown when a provider-specific operation fails.
 */
export class SandboxProviderError extends Data.TaggedError("SandboxProvider")<{
  message: string
  status?: number
  cause?: unknown
  context?: SandboxErrorContext
}> {}

/**
 * Error thrown when input validation fails.
 */
export class SandboxValidationError extends Data.TaggedError("SandboxValidation")<{
  message: string
  context?: SandboxErrorContext
}> {}

/**
 * A placeholder backend was asked for something it cannot do.
 */
export class SandboxNotImplementedError extends Data.TaggedError("SandboxNotImplemented")<{
  provider: string
  operation: string
  context?: SandboxErrorContext
}> {}

/**
 * Union type of all sandbox errors.
 */
export type SandboxError =
  | SandboxConfigurationError
  | SandboxNotFoundError
  | SandboxTransientError
  | SandboxProvisioningError
  | SandboxAuthError
  | SandboxProviderError
  | SandboxValidationError
  | SandboxNotImplementedError

/**
 * Input for HTTP error mapping with optional headers for retry-after parsing.
 */
export interface HttpErrorInput {
  status: number
  body?: string
  headers?: Headers | Record<string, string>
}

/**
 * Parse Retry-After header value to milliseconds.
 * Supports both delta-seconds (e.g., "120") and HTTP-date formats.
 *
 * @returns Retry delay in milliseconds, or undefined if not present/parseable
 */
export const parseRetryAfterMs = (
  headers: Headers | Record<string, string> | undefined,
): number | undefined => {
  if (!headers) return undefined

  const value = headers instanceof Headers ? headers.get("retry-after") : headers["retry-after"]
  if (!value) return undefined

  const seconds = parseInt(value, 10)
  if (!isNaN(seconds)) {
    return Math.max(100, Math.min(seconds * 1000, 60000))
  }

  const date = Date.parse(value)
  if (!isNaN(date)) {
    const delayMs = date - Date.now()
    return delayMs > 0 ? Math.min(delayMs, 60000) : undefined
  }

  return undefined
}

/**
 * Map an HTTP response to a typed SandboxError with full context.
 *
 * @example
 * ```ts
 * const error = mapHttpErrorWithContext(
 *   { status: 429, body: "Rate limited", headers: response.headers },
 *   { provider: "daytona", operation: "GET /sandbox/sbx-123" },
 *   "sbx-123"
 * )
 * ```
 */
export const mapHttpErrorWithContext = (
  input: HttpErrorInput,
  context?: SandboxErrorContext,
  idFor404?: string,
): SandboxError => {
  const { status, body = "", headers } = input
  const ctx = context ? { ...context, timestamp: context.timestamp ?? new Date().toISOString() } : undefined

  if (status === 401 || status === 403) {
    return new SandboxAuthError({ message: body, context: ctx })
  }
  if (status === 404) {
    return new SandboxNotFoundError({
      id: idFor404 ?? ctx?.sandboxId ?? "unknown",
      context: ctx,
    })
  }
  if (status === 408) {
    return new SandboxTransientError({ reason: "timeout", message: body, context: ctx })
  }
  if (status === 429) {
    return new SandboxTransientError({
      reason: "rate-limit",
      message: body,
      retryAfterMs: parseRetryAfterMs(headers),
      context: ctx,
    })
  }
  if (status >= 500) {
    return new SandboxTransientError({
      reason: "network",
      message: `${status}: ${body}`,
      cause: new Error(`${status}: ${body}`),
      context: ctx,
    })
  }
  return new SandboxProviderError({ message: `${status}: ${body}`, status, context: ctx })
}

/**
 * Check if an error is a transient error that a caller can retry.
 */
export const isTransientSandboxError = (err: SandboxError): err is SandboxTransientError =>
  err._tag === "SandboxTransient"

/**
 * Type guard to check if an error is already a SandboxError.
 */
export const isSandboxError = (err: unknown): err is SandboxError =>
  err instanceof SandboxConfigurationError ||
  err instanceof SandboxNotFoundError ||
  err instanceof SandboxTransientError ||
  err instanceof SandboxProvisioningError ||
  err instanceof SandboxAuthError ||
  err instanceof SandboxProviderError ||
  err instanceof SandboxValidationError ||
  err instanceof SandboxNotImplementedError

/**
 * Human-readable summary of any SandboxError.
 */
export const describeSandboxError = (err: SandboxError): string => {
  switch (err._tag) {
    case "SandboxNotFound":
      return `Sandbox ${err.id} not found`
    case "SandboxTransient":
      return err.message ? `${err.reason}: ${err.message}` : err.reason
    case "SandboxNotImplemented":
      return `${err.provider}.${err.operation} is not implemented`
    default:
      return err.message
  }
}

/**
 * Re-type a failed creation request as a SandboxProvisioningError.
 * Transient and configuration failures keep their own tag so callers can still tell them apart.
 */
export const toProvisioningError = (err: SandboxError): SandboxError => {
  switch (err._tag) {
    case "SandboxTransient":
    case "SandboxConfiguration":
    case "SandboxProvisioning":
      return err
    default:
      return new SandboxProvisioningError({ message: describeSandboxError(err), cause: err, context: err.context })
  }
}

/**
 * Fail with SandboxNotImplementedError when the handle came from a placeholder backend.
 */
export const requireUsableHandle = <Instance>(
  handle: SandboxHandle<Instance>,
  operation = "use",
): Effect.Effect<SandboxHandle<Instance>, SandboxNotImplementedError> =>
  handle.usable
    ? Effect.succeed(handle)
    : Effect.fail(
        new SandboxNotImplementedError({
          provider: handle.provider,
          operation,
          context: { provider: handle.provider, sandboxId: handle.id },
        }),
      )

/**
 * Wraps an effect with operation context, timing, and tracing spans.
 *
 * This helper:
 * - Creates a span for observability/tracing
 * - Measures operation duration
 * - Adds error context on failure
 * - Annotates logs with operation info
 *
 * @example
 * ```ts
 * const handle = withOperationContext(
 *   { provider: "daytona", operation: "getOrStartSandbox", sandboxId: id },
 *   resolve(id)
 * )
 * ```
 */
export const withOperationContext = <A, R>(
  context: SandboxErrorContext,
  effect: Effect.Effect<A, SandboxError, R>,
): Effect.Effect<A, SandboxError, R> => {
  const spanName = ["sandbox", context.provider, context.operation].filter(Boolean).join(".")

  return Effect.gen(function* () {
    const startTime = yield* Clock.currentTimeMillis
    const result = yield* Effect.either(effect)

    if (result._tag === "Left") {
      const endTime = yield* Clock.currentTimeMillis
      const durationMs = endTime - startTime
      const timestamp = new Date(endTime).toISOString()
      const enrichedContext = { ...result.left.context, ...context, durationMs, timestamp }
      return yield* Effect.fail(addContextToError(result.left, enrichedContext))
    }

    return result.right
  }).pipe(
    Effect.withSpan(spanName, {
      attributes: {
        "sandbox.provider": context.provider ?? "",
        "sandbox.operation": context.operation ?? "",
        "sandbox.id": context.sandboxId ?? "",
      },
    }),
    Effect.annotateLogs({
      provider: context.provider ?? "",
      sandboxId: context.sandboxId ?? "",
    }),
  )
}

/**
 * Add context to an existing SandboxError (returns a new error with context).
 */
export const addContextToError = (err: SandboxError, ctx: SandboxErrorContext): SandboxError => {
  switch (err._tag) {
    case "SandboxConfiguration":
      return new SandboxConfigurationError({ ...err, context: ctx })
    case "SandboxNotFound":
      return new SandboxNotFoundError({ ...err, context: ctx })
    case "SandboxTransient":
      return new SandboxTransientError({ ...err, context: ctx })
    case "SandboxProvisioning":
      return new SandboxProvisioningError({ ...err, context: ctx })
    case "SandboxAuth":
      return new SandboxAuthError({ ...err, context: ctx })
    case "SandboxProvider":
      return new SandboxProviderError({ ...err, context: ctx })
    case "SandboxValidation":
      return new SandboxValidationError({ ...err, context: ctx })
    case "SandboxNotImplemented":
      return new SandboxNotImplementedError({ ...err, context: ctx })
  }
}

/**
 * Convert a SandboxError to a log-friendly object (safe for structured logging).
 */
export const sandboxErrorToLog = (err: SandboxError): Record<string, unknown> => {
  const base: Record<string, unknown> = {
    tag: err._tag,
    message: describeSandboxError(err),
  }

  if (err.context) {
    base.provider = err.context.provider
    base.operation = err.context.operation
    base.sandboxId = err.context.sandboxId
    base.durationMs = err.context.durationMs
  }

  switch (err._tag) {
    case "SandboxTransient":
      base.reason = err.reason
      base.retryAfterMs = err.retryAfterMs
      break
    case "SandboxProvider":
      base.status = err.status
      break
    case "SandboxNotFound":
      base.id = err.id
      break
  }

  return base
}

/**
 * Validate a sandbox ID is non-empty.
 */
export const validateSandboxId = (
  id: string,
  context?: SandboxErrorContext,
): Effect.Effect<void, SandboxValidationError> => {
  if (!id || id.trim().length === 0) {
    return Effect.fail(
      new SandboxValidationError({
        message: "Sandbox ID cannot be empty",
        context: context ? { ...context, timestamp: new Date().toISOString() } : undefined,
      }),
    )
  }
  return Effect.void
}
