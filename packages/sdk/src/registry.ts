import { Config, type ConfigError, Effect, Layer, Option, SynchronizedRef } from "effect"
import { SandboxConfigurationError, type SandboxError } from "./errors"
import { SandboxProvider, type SandboxProviderService } from "./provider"
import type { SandboxHandle } from "./types"

/**
 * Builds one provider instance. Runs at most once per registry.
 */
export type ProviderFactory = Effect.Effect<SandboxProviderService, SandboxConfigurationError>

export interface ProviderRegistryOptions {
  /** Factories keyed by backend name (matched case-insensitively) */
  readonly factories: Readonly<Record<string, ProviderFactory>>
  /** Backend used when the configured name is absent or not recognised */
  readonly defaultProvider: string
  /** Where the backend name comes from. Defaults to the SANDBOX_PROVIDER setting. */
  readonly providerName?: Effect.Effect<string | undefined, ConfigError.ConfigError>
}

export interface ProviderRegistry {
  /**
   * The selected provider. The first call selects and constructs it; every later
   * call (including concurrent first calls) returns the same instance.
   */
  readonly provider: () => Effect.Effect<SandboxProviderService, SandboxConfigurationError>
  readonly getOrStartSandbox: (sandboxId: string) => Effect.Effect<SandboxHandle, SandboxError>
  readonly createSandbox: (password: string, projectId?: string) => Effect.Effect<SandboxHandle, SandboxError>
}

/**
 * Backend name from SANDBOX_PROVIDER, if set.
 */
export const configuredProviderName: Effect.Effect<string | undefined, ConfigError.ConfigError> = Effect.gen(
  function* () {
    const name = yield* Config.string("SANDBOX_PROVIDER").pipe(Config.option)
    return Option.getOrUndefined(name)
  },
)

/**
 * Create a provider registry backed by a lazily filled, once-only slot.
 *
 * @example
 * ```ts
 * const registry = yield* makeProviderRegistry({
 *   factories: { daytona: DaytonaProviderFromEnv, e2b: E2BProviderFromEnv },
 *   defaultProvider: "daytona",
 * })
 * const handle = yield* registry.getOrStartSandbox("sbx-1")
 * ```
 */
export const makeProviderRegistry = (options: ProviderRegistryOptions): Effect.Effect<ProviderRegistry> =>
  Effect.gen(function* () {
    const factories = new Map(
      Object.entries(options.factories).map(([name, factory]) => [name.toLowerCase(), factory] as const),
    )
    const defaultName = options.defaultProvider.toLowerCase()
    const providerName = options.providerName ?? configuredProviderName
    const slot = yield* SynchronizedRef.make(Option.none<SandboxProviderService>())

    const select = Effect.gen(function* () {
      const requested = yield* providerName.pipe(
        Effect.mapError(
          (cause) => new SandboxConfigurationError({ message: "Invalid SANDBOX_PROVIDER setting", cause }),
        ),
      )
      const normalized = requested?.trim().toLowerCase()
      const known = normalized !== undefined && factories.has(normalized)
      if (normalized && !known) {
        yield* Effect.logWarning(
          `Unknown sandbox provider "${normalized}", falling back to "${defaultName}". Available: [${[...factories.keys()].join(", ")}]`,
        )
      }

      const name = known && normalized ? normalized : defaultName
      const factory = factories.get(name)
      if (!factory) {
        return yield* Effect.fail(
          new SandboxConfigurationError({ message: `No factory registered for sandbox provider "${name}"` }),
        )
      }

      const instance = yield* factory
      yield* Effect.logInfo(`Using sandbox provider: ${name}`)
      return instance
    })

    type Slot = Option.Option<SandboxProviderService>

    const provider = () =>
      SynchronizedRef.modifyEffect(
        slot,
        (current): Effect.Effect<readonly [SandboxProviderService, Slot], SandboxConfigurationError> =>
          Option.match(current, {
            onSome: (instance) => Effect.succeed([instance, current] as const),
            onNone: () => Effect.map(select, (instance) => [instance, Option.some(instance)] as const),
          }),
      )

    return {
      provider,
      getOrStartSandbox: (sandboxId) => Effect.flatMap(provider(), (p) => p.getOrStartSandbox(sandboxId)),
      createSandbox: (password, projectId) => Effect.flatMap(provider(), (p) => p.createSandbox(password, projectId)),
    } satisfies ProviderRegistry
  })

/**
 * Provide the registry's selected provider as the SandboxProvider service.
 */
export const SandboxProviderFromRegistry = (registry: ProviderRegistry) =>
  Layer.effect(SandboxProvider, registry.provider())
