import { describe, it, expect } from "vitest"
import { ConfigProvider, Effect } from "effect"
import { makeProviderRegistry, SandboxProviderFromRegistry, type ProviderFactory } from "../registry"
import { SandboxConfigurationError } from "../errors"
import { SandboxProvider, getOrStartSandbox, type SandboxProviderService } from "../provider"
import { captureLogs, makeMockProvider, type MockProvider } from "../testing"

interface CountingFactory {
  factory: ProviderFactory
  mock: MockProvider
  builds: () => number
}

const countingFactory = (name: string, delayMs = 0): CountingFactory => {
  const mock = makeMockProvider({ name })
  let builds = 0
  const factory: ProviderFactory = Effect.gen(function* () {
    builds += 1
    if (delayMs > 0) yield* Effect.sleep(delayMs)
    return mock.service
  })
  return { factory, mock, builds: () => builds }
}

const registryFor = (requested: string | undefined, delayMs = 0) => {
  const daytona = countingFactory("daytona", delayMs)
  const e2b = countingFactory("e2b")
  let reads = 0
  const registry = Effect.runSync(
    makeProviderRegistry({
      factories: { daytona: daytona.factory, e2b: e2b.factory },
      defaultProvider: "daytona",
      providerName: Effect.sync(() => {
        reads += 1
        return requested
      }),
    }),
  )
  return { registry, daytona, e2b, reads: () => reads }
}

describe("ProviderRegistry", () => {
  it("returns the identical instance on every call", async () => {
    const { registry, daytona } = registryFor("daytona")

    const first = await Effect.runPromise(registry.provider())
    const second = await Effect.runPromise(registry.provider())

    expect(second).toBe(first)
    expect(daytona.builds()).toBe(1)
  })

  it("reads the configuration at most once", async () => {
    const { registry, reads } = registryFor("e2b")

    await Effect.runPromise(registry.provider())
    await Effect.runPromise(registry.provider())
    await Effect.runPromise(registry.getOrStartSandbox("mock").pipe(Effect.either))

    expect(reads()).toBe(1)
  })

  it("does nothing until first use", () => {
    const { daytona, reads } = registryFor("daytona")

    expect(reads()).toBe(0)
    expect(daytona.builds()).toBe(0)
  })

  it("constructs one provider for concurrent first calls", async () => {
    const { registry, daytona } = registryFor(undefined, 10)

    const providers = await Effect.runPromise(
      Effect.all([registry.provider(), registry.provider(), registry.provider()], { concurrency: "unbounded" }),
    )

    expect(daytona.builds()).toBe(1)
    expect(new Set<SandboxProviderService>(providers).size).toBe(1)
  })

  it.each([
    ["e2b", "e2b"],
    ["E2B", "e2b"],
    [" e2b ", "e2b"],
    ["daytona", "daytona"],
    ["Daytona", "daytona"],
    [undefined, "daytona"],
    ["", "daytona"],
    ["firecracker", "daytona"],
  ])("selects %j as %s", async (requested, expected) => {
    const { registry } = registryFor(requested)

    const provider = await Effect.runPromise(registry.provider())

    expect(provider.name).toBe(expected)
  })

  it("warns about an unknown name and logs the selection once", async () => {
    const { registry } = registryFor("firecracker")
    const logs = captureLogs()

    await Effect.runPromise(registry.provider().pipe(Effect.provide(logs.layer)))
    await Effect.runPromise(registry.provider().pipe(Effect.provide(logs.layer)))

    expect(logs.entries).toEqual([
      {
        level: "WARN",
        message: 'Unknown sandbox provider "firecracker", falling back to "daytona". Available: [daytona, e2b]',
      },
      { level: "INFO", message: "Using sandbox provider: daytona" },
    ])
  })

  it("reads SANDBOX_PROVIDER by default", async () => {
    const e2b = countingFactory("e2b")
    const registry = Effect.runSync(
      makeProviderRegistry({
        factories: { daytona: countingFactory("daytona").factory, e2b: e2b.factory },
        defaultProvider: "daytona",
      }),
    )

    const provider = await Effect.runPromise(
      registry
        .provider()
        .pipe(Effect.withConfigProvider(ConfigProvider.fromMap(new Map([["SANDBOX_PROVIDER", "E2B"]])))),
    )

    expect(provider).toBe(e2b.mock.service)
  })

  it("surfaces a failed construction and retries it on the next call", async () => {
    let attempts = 0
    const registry = Effect.runSync(
      makeProviderRegistry({
        factories: {
          daytona: Effect.suspend(() => {
            attempts += 1
            return Effect.fail(new SandboxConfigurationError({ message: "SANDBOX_API_KEY is required" }))
          }),
        },
        defaultProvider: "daytona",
        providerName: Effect.succeed(undefined),
      }),
    )

    const first = await Effect.runPromise(Effect.flip(registry.getOrStartSandbox("sbx-1")))
    const second = await Effect.runPromise(Effect.flip(registry.createSandbox("pw123")))

    expect(first._tag).toBe("SandboxConfiguration")
    expect(second._tag).toBe("SandboxConfiguration")
    expect(attempts).toBe(2)
  })

  it("fails when the default backend has no factory", async () => {
    const registry = Effect.runSync(
      makeProviderRegistry({ factories: {}, defaultProvider: "daytona", providerName: Effect.succeed("e2b") }),
    )

    const error = await Effect.runPromise(Effect.flip(registry.provider()))

    expect(error.message).toBe('No factory registered for sandbox provider "daytona"')
  })

  it("delegates lifecycle operations to the selected provider", async () => {
    const { registry, daytona } = registryFor("daytona")
    daytona.mock.sandboxes.set("sbx-2", { id: "sbx-2", state: "stopped" })

    const resolved = await Effect.runPromise(registry.getOrStartSandbox("sbx-2"))
    const created = await Effect.runPromise(registry.createSandbox("pw123", "proj-9"))

    expect(resolved.state).toBe("running")
    expect(created.id).toBe("daytona-sbx-1")
    expect(daytona.mock.calls.map((call) => call.operation)).toEqual([
      "getOrStartSandbox",
      "start",
      "startSupervisordSession",
      "createSandbox",
      "startSupervisordSession",
    ])
  })

  it("provides its memoized instance as the SandboxProvider service", async () => {
    const { registry, daytona } = registryFor("daytona")
    daytona.mock.sandboxes.set("sbx-1", { id: "sbx-1", state: "running" })
    const layer = SandboxProviderFromRegistry(registry)

    const fromLayer = await Effect.runPromise(Effect.provide(SandboxProvider, layer))
    const handle = await Effect.runPromise(Effect.provide(getOrStartSandbox("sbx-1"), layer))
    const fromRegistry = await Effect.runPromise(registry.provider())

    expect(fromLayer).toBe(fromRegistry)
    expect(handle.provider).toBe("daytona")
    expect(daytona.builds()).toBe(1)
  })
})
