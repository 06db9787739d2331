import { Config, Effect, Option } from "effect"

export interface DaytonaConfig {
  apiKey: string
  baseUrl?: string
  organizationId?: string
  /** Deployment target (region) new sandboxes are placed in */
  target?: string
  /** Runtime image for new sandboxes; creation fails without it */
  image?: string
  /** How long a start or create may take to reach "started" (default: 60000) */
  startTimeoutMs?: number
  /** Delay between state checks while waiting (default: 1000) */
  pollIntervalMs?: number
}

export const DEFAULT_DAYTONA_BASE_URL = "https://app.daytona.io/api"
export const DEFAULT_START_TIMEOUT_MS = 60_000
export const DEFAULT_POLL_INTERVAL_MS = 1000

/**
 * Generic SANDBOX_* name first, then the Daytona-specific one.
 */
const withFallback = (name: string, fallback: string) =>
  Config.string(name).pipe(Config.orElse(() => Config.string(fallback)))

export const loadDaytonaConfig = Effect.gen(function* () {
  const apiKey = yield* withFallback("SANDBOX_API_KEY", "DAYTONA_API_KEY")
  const baseUrl = yield* withFallback("SANDBOX_SERVER_URL", "DAYTONA_SERVER_URL").pipe(
    Config.withDefault(DEFAULT_DAYTONA_BASE_URL),
  )
  const target = yield* withFallback("SANDBOX_TARGET", "DAYTONA_TARGET").pipe(Config.option)
  const organizationId = yield* Config.string("DAYTONA_ORG_ID").pipe(Config.option)
  const image = yield* Config.string("SANDBOX_IMAGE_NAME").pipe(Config.option)
  const startTimeoutMs = yield* Config.integer("SANDBOX_START_TIMEOUT_MS").pipe(
    Config.withDefault(DEFAULT_START_TIMEOUT_MS),
  )
  return {
    apiKey,
    baseUrl,
    target: Option.getOrUndefined(target),
    organizationId: Option.getOrUndefined(organizationId),
    image: Option.getOrUndefined(image),
    startTimeoutMs,
  } satisfies DaytonaConfig
})
