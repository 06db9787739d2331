/**
 * Lifecycle states every provider normalises to.
 * Provider-specific states (e.g. "starting", "error") pass through unmodified.
 */
export type KnownLifecycleState = "running" | "stopped" | "archived"

export type SandboxLifecycleState = KnownLifecycleState | (string & {})

const DORMANT_STATES: ReadonlySet<SandboxLifecycleState> = new Set<SandboxLifecycleState>(["stopped", "archived"])

/**
 * Only dormant sandboxes are eligible for a start. Anything else is treated as usable.
 */
export const isDormantState = (state: SandboxLifecycleState): boolean => DORMANT_STATES.has(state)

/**
 * Reference to one remote sandbox instance as observed at resolution time.
 *
 * Handles are never cached: once the remote state changes the handle is stale
 * and the sandbox must be resolved again.
 */
export interface SandboxHandle<Instance = unknown> {
  readonly id: string
  /** Name of the provider that produced the handle (e.g. "daytona") */
  readonly provider: string
  readonly state: SandboxLifecycleState
  /**
   * False when the provider is a placeholder with no remote integration.
   * @see requireUsableHandle
   */
  readonly usable: boolean
  /** Provider-specific payload (decoded API record, connection info, ...) */
  readonly instance: Instance
}

/**
 * Resource envelope requested at creation time.
 * cpu in cores, memory and disk in GiB.
 */
export interface SandboxResources {
  cpu: number
  memory: number
  disk: number
}

/**
 * Provider-neutral description of a sandbox to provision.
 */
export interface SandboxCreateRequest {
  image: string
  resources: SandboxResources
  env: Record<string, string>
  labels?: Record<string, string>
}
