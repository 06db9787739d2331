import { Effect } from "effect"
import type { ProviderFactory, SandboxHandle, SandboxProviderService } from "@sandbox-lifecycle/sdk"

/**
 * Placeholder handle payload: the id is echoed back, nothing is connected.
 */
export interface E2BPlaceholderInstance {
  sandboxId: string
}

export type E2BHandle = SandboxHandle<E2BPlaceholderInstance>

export interface E2BProviderService extends SandboxProviderService {
  readonly createSandbox: (password: string, projectId?: string) => Effect.Effect<E2BHandle>
  readonly getOrStartSandbox: (sandboxId: string) => Effect.Effect<E2BHandle>
  readonly startSupervisordSession: (handle: SandboxHandle) => Effect.Effect<void>
}

const placeholderHandle = (sandboxId: string): E2BHandle => ({
  id: sandboxId,
  provider: "e2b",
  state: "unknown",
  usable: false,
  instance: { sandboxId },
})

const notImplemented = (operation: string) =>
  Effect.logWarning(`E2BProvider.${operation} is not implemented`).pipe(Effect.annotateLogs({ provider: "e2b" }))

/**
 * Placeholder backend for E2B or another self-hosted implementation.
 *
 * Every operation logs a warning and returns a handle marked `usable: false`;
 * `requireUsableHandle` turns such a handle into a SandboxNotImplementedError downstream.
 */
export const makeE2BProvider: Effect.Effect<E2BProviderService> = Effect.gen(function* () {
  yield* Effect.logDebug("Initializing E2B sandbox provider")
  // TODO: connect an E2B client (E2B_API_KEY) once the remote integration is implemented.

  return {
    name: "e2b",
    getOrStartSandbox: (sandboxId: string) =>
      Effect.as(notImplemented("getOrStartSandbox"), placeholderHandle(sandboxId)),
    createSandbox: () => Effect.as(notImplemented("createSandbox"), placeholderHandle("placeholder")),
    startSupervisordSession: () => notImplemented("startSupervisordSession"),
  }
})

export const E2BProviderFromEnv: ProviderFactory = makeE2BProvider
