import { Effect } from "effect"
import {
  createSandboxClient,
  makeProviderRegistry,
  type ProviderFactory,
  type ProviderRegistry,
  type SandboxClient,
} from "@sandbox-lifecycle/sdk"
import { DaytonaProviderFromEnv } from "@sandbox-lifecycle/daytona"
import { E2BProviderFromEnv } from "@sandbox-lifecycle/e2b"

/**
 * Backends selectable through SANDBOX_PROVIDER.
 */
export const builtinProviders: Readonly<Record<string, ProviderFactory>> = {
  daytona: DaytonaProviderFromEnv,
  e2b: E2BProviderFromEnv,
}

export const DEFAULT_PROVIDER = "daytona"

/**
 * A registry over the built-in backends. Useful when a process needs a private slot,
 * e.g. in tests; everything else should share {@link registry}.
 */
export const makeBuiltinRegistry: Effect.Effect<ProviderRegistry> = makeProviderRegistry({
  factories: builtinProviders,
  defaultProvider: DEFAULT_PROVIDER,
})

/**
 * The process-wide registry. Nothing is selected or constructed until the first call.
 */
export const registry: ProviderRegistry = Effect.runSync(makeBuiltinRegistry)

const client: SandboxClient = createSandboxClient(registry)

/**
 * The selected provider, constructed on first use.
 */
export const getSandboxProvider = () => client.provider()

/**
 * Resolve a sandbox id to a running sandbox, starting it first when it is stopped or archived.
 *
 * @example
 * ```ts
 * const handle = await getOrStartSandbox("sbx-1")
 * console.log(handle.state) // "running"
 * ```
 */
export const getOrStartSandbox = (sandboxId: string) => client.getOrStartSandbox(sandboxId)

/**
 * Provision a sandbox with the browser environment and a running supervisor.
 *
 * @example
 * ```ts
 * const handle = await createSandbox("vnc-secret", "project-42")
 * ```
 */
export const createSandbox = (password: string, projectId?: string) => client.createSandbox(password, projectId)
