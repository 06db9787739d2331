import { ConfigError, Duration, Effect, Schema } from "effect"
import {
  type ProviderFactory,
  type SandboxError,
  type SandboxHandle,
  type SandboxLifecycleState,
  type SandboxProviderService,
  SandboxConfigurationError,
  SandboxProviderError,
  SandboxTransientError,
  SUPERVISORD_COMMAND,
  SUPERVISORD_SESSION_ID,
  buildCreateRequest,
  isDormantState,
  toProvisioningError,
  validateSandboxId,
  withOperationContext,
} from "@sandbox-lifecycle/sdk"
import {
  DaytonaSandbox,
  type DaytonaCreateSandboxBody,
  type DaytonaCreateSessionBody,
  type DaytonaSessionExecuteBody,
} from "./api"
import { createClient, type DaytonaClient } from "./client"
import {
  DEFAULT_DAYTONA_BASE_URL,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_START_TIMEOUT_MS,
  loadDaytonaConfig,
  type DaytonaConfig,
} from "./config"

export type DaytonaHandle = SandboxHandle<DaytonaSandbox>

export interface DaytonaProviderService extends SandboxProviderService {
  readonly createSandbox: (password: string, projectId?: string) => Effect.Effect<DaytonaHandle, SandboxError>
  readonly getOrStartSandbox: (sandboxId: string) => Effect.Effect<DaytonaHandle, SandboxError>
}

/**
 * Daytona reports a running sandbox as "started"; every other state keeps its name.
 */
export const normalizeState = (state: string): SandboxLifecycleState => (state === "started" ? "running" : state)

const toHandle = (sandbox: DaytonaSandbox): DaytonaHandle => ({
  id: sandbox.id,
  provider: "daytona",
  state: normalizeState(sandbox.state),
  usable: true,
  instance: sandbox,
})

const FAILED_STATES: ReadonlySet<string> = new Set(["error", "build_failed"])

/**
 * A second bootstrap finds the session already there; that is the expected path, not a failure.
 */
const isExistingSession = (err: SandboxError): boolean =>
  err._tag === "SandboxProvider" && (err.status === 409 || /already exists/i.test(err.message))

export const makeDaytonaProvider = (
  config: DaytonaConfig,
  client: DaytonaClient = createClient(config.baseUrl ?? DEFAULT_DAYTONA_BASE_URL, config.apiKey, config.organizationId),
): Effect.Effect<DaytonaProviderService> =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Initializing Daytona sandbox provider (${client.baseUrl})`)

    const decodeSandbox = (operation: string) => (value: unknown) =>
      Schema.decodeUnknown(DaytonaSandbox)(value).pipe(
        Effect.mapError(
          (cause) =>
            new SandboxProviderError({
              message: `Unexpected response from ${operation}: ${cause.message}`,
              cause,
              context: { provider: "daytona", operation },
            }),
        ),
      )

    const fetchSandbox = (sandboxId: string) =>
      client
        .request("GET", `/sandbox/${encodeURIComponent(sandboxId)}`)
        .pipe(Effect.flatMap(decodeSandbox("GET /sandbox")))

    const startTimeoutMs = config.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS
    const pollInterval = Duration.millis(config.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS)

    /**
     * Poll until the control plane reports "started". Start and create return before the
     * sandbox is up, and the toolbox rejects sessions until it is.
     */
    const awaitStarted = (sandboxId: string) =>
      Effect.gen(function* () {
        while (true) {
          const sandbox = yield* fetchSandbox(sandboxId)
          if (sandbox.state === "started") {
            return sandbox
          }
          if (FAILED_STATES.has(sandbox.state)) {
            return yield* Effect.fail(
              new SandboxProviderError({
                message: `Sandbox ${sandboxId} entered ${sandbox.state} state${sandbox.errorReason ? `: ${sandbox.errorReason}` : ""}`,
              }),
            )
          }
          yield* Effect.sleep(pollInterval)
        }
      }).pipe(
        Effect.timeoutFail({
          duration: Duration.millis(startTimeoutMs),
          onTimeout: () =>
            new SandboxTransientError({
              reason: "timeout",
              message: `Sandbox ${sandboxId} did not reach started state within ${startTimeoutMs}ms`,
            }),
        }),
      )

    const startSandbox = (sandboxId: string) =>
      client.request("POST", `/sandbox/${encodeURIComponent(sandboxId)}/start`).pipe(
        Effect.zipRight(awaitStarted(sandboxId)),
        Effect.asVoid,
      )

    const startSupervisordSession = (handle: SandboxHandle) =>
      Effect.gen(function* () {
        const sessions = `/toolbox/${encodeURIComponent(handle.id)}/toolbox/process/session`
        const createBody: DaytonaCreateSessionBody = { sessionId: SUPERVISORD_SESSION_ID }
        const executeBody: DaytonaSessionExecuteBody = { command: SUPERVISORD_COMMAND, runAsync: true }

        yield* Effect.logInfo(`Creating session ${SUPERVISORD_SESSION_ID} for supervisord`)
        yield* client.request("POST", sessions, createBody).pipe(
          Effect.catchIf(isExistingSession, () =>
            Effect.logDebug(`Session ${SUPERVISORD_SESSION_ID} already exists, reusing it`),
          ),
        )
        yield* client.request("POST", `${sessions}/${SUPERVISORD_SESSION_ID}/exec`, executeBody)
        yield* Effect.logInfo(`Supervisord started in session ${SUPERVISORD_SESSION_ID}`)
      }).pipe(Effect.annotateLogs({ provider: "daytona", sandboxId: handle.id }))

    const provider: DaytonaProviderService = {
      name: "daytona",

      getOrStartSandbox: (sandboxId: string) =>
        withOperationContext(
          { provider: "daytona", operation: "getOrStartSandbox", sandboxId },
          Effect.gen(function* () {
            yield* validateSandboxId(sandboxId)
            yield* Effect.logInfo(`Getting or starting sandbox with ID: ${sandboxId}`)

            const current = toHandle(yield* fetchSandbox(sandboxId))
            if (!isDormantState(current.state)) {
              return current
            }

            yield* Effect.logInfo(`Sandbox is in ${current.state} state. Starting...`)
            yield* startSandbox(sandboxId)
            const restarted = toHandle(yield* fetchSandbox(sandboxId))
            yield* startSupervisordSession(restarted)
            return restarted
          }),
        ),

      createSandbox: (password: string, projectId?: string) =>
        withOperationContext(
          { provider: "daytona", operation: "createSandbox" },
          Effect.gen(function* () {
            if (!config.image) {
              return yield* Effect.fail(
                new SandboxConfigurationError({ message: "SANDBOX_IMAGE_NAME is not set; cannot create sandboxes" }),
              )
            }

            yield* Effect.logDebug("Creating new Daytona sandbox environment")
            const request = buildCreateRequest(config.image, password, projectId)
            const body: DaytonaCreateSandboxBody = {
              image: request.image,
              public: true,
              env: request.env,
              resources: request.resources,
              ...(request.labels ? { labels: request.labels } : {}),
              ...(config.target ? { target: config.target } : {}),
            }

            const response = yield* client.request("POST", "/sandbox", body).pipe(Effect.mapError(toProvisioningError))
            const created = yield* decodeSandbox("POST /sandbox")(response)
            const sandbox = created.state === "started" ? created : yield* awaitStarted(created.id)
            const handle = toHandle(sandbox)
            yield* startSupervisordSession(handle)
            yield* Effect.logDebug(`Sandbox ${sandbox.id} created`)
            return handle
          }),
        ),

      startSupervisordSession: (handle: SandboxHandle) =>
        withOperationContext(
          { provider: "daytona", operation: "startSupervisordSession", sandboxId: handle.id },
          startSupervisordSession(handle),
        ),
    }

    yield* Effect.logDebug("Daytona client initialized")
    return provider
  })

/**
 * Registry factory: configuration from the environment, failures as SandboxConfigurationError.
 */
export const DaytonaProviderFromEnv: ProviderFactory = loadDaytonaConfig.pipe(
  Effect.mapError(
    (cause) =>
      new SandboxConfigurationError({
        message: ConfigError.isMissingDataOnly(cause)
          ? "Daytona provider cannot be constructed: SANDBOX_API_KEY or DAYTONA_API_KEY is required"
          : `Daytona provider cannot be constructed: ${String(cause)}`,
        cause,
      }),
  ),
  Effect.flatMap((config) => makeDaytonaProvider(config)),
)
