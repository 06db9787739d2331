import { Context, Effect } from "effect"
import type { SandboxError } from "./errors"
import type { SandboxHandle } from "./types"

/**
 * Lifecycle capability set every sandbox backend implements.
 */
export interface SandboxProviderService {
  /**
   * Backend name, as used for selection (e.g. "daytona").
   */
  readonly name: string

  /**
   * Provision a new sandbox and bootstrap its supervisor before returning.
   * A project id is attached as the `id` label.
   */
  readonly createSandbox: (password: string, projectId?: string) => Effect.Effect<SandboxHandle, SandboxError>

  /**
   * Resolve an id to a running sandbox, starting it first when it is stopped or archived.
   */
  readonly getOrStartSandbox: (sandboxId: string) => Effect.Effect<SandboxHandle, SandboxError>

  /**
   * Ensure the supervisor runs inside the sandbox, in the well-known session.
   * Safe to call again: the same session is reused.
   */
  readonly startSupervisordSession: (handle: SandboxHandle) => Effect.Effect<void, SandboxError>
}

export class SandboxProvider extends Context.Tag("SandboxProvider")<SandboxProvider, SandboxProviderService>() {}

/**
 * Standalone effect functions for lifecycle operations.
 * These automatically resolve the SandboxProvider service from context.
 */
export const createSandbox = (
  password: string,
  projectId?: string,
): Effect.Effect<SandboxHandle, SandboxError, SandboxProvider> =>
  Effect.flatMap(SandboxProvider, (svc) => svc.createSandbox(password, projectId))

export const getOrStartSandbox = (sandboxId: string): Effect.Effect<SandboxHandle, SandboxError, SandboxProvider> =>
  Effect.flatMap(SandboxProvider, (svc) => svc.getOrStartSandbox(sandboxId))

export const startSupervisordSession = (handle: SandboxHandle): Effect.Effect<void, SandboxError, SandboxProvider> =>
  Effect.flatMap(SandboxProvider, (svc) => svc.startSupervisordSession(handle))
