import { Cause, Effect, Exit, Layer } from "effect"
import type { SandboxError } from "./errors"
import { LoggingLive } from "./logging"
import type { SandboxProviderService } from "./provider"
import type { ProviderRegistry } from "./registry"
import type { SandboxHandle } from "./types"

/**
 * Promise-based entry points over a provider registry.
 */
export interface SandboxClient {
  provider(): Promise<SandboxProviderService>
  getOrStartSandbox(sandboxId: string): Promise<SandboxHandle>
  createSandbox(password: string, projectId?: string): Promise<SandboxHandle>
}

/**
 * Wrap a registry in a Promise API.
 *
 * Failures reject with the tagged SandboxError itself, so callers can branch on `_tag`
 * or use `instanceof`.
 */
export function createSandboxClient(
  registry: ProviderRegistry,
  layer: Layer.Layer<never> = LoggingLive,
): SandboxClient {
  const run = async <A>(effect: Effect.Effect<A, SandboxError>): Promise<A> => {
    const exit = await Effect.runPromiseExit(effect.pipe(Effect.provide(layer)))
    if (Exit.isSuccess(exit)) return exit.value
    throw Cause.squash(exit.cause)
  }

  return {
    provider: () => run(registry.provider()),
    getOrStartSandbox: (sandboxId) => run(registry.getOrStartSandbox(sandboxId)),
    createSandbox: (password, projectId) => run(registry.createSandbox(password, projectId)),
  }
}
