import { describe, it, expect } from "vitest"
import { Effect } from "effect"
import { createSandboxClient } from "../client"
import { makeProviderRegistry } from "../registry"
import { SandboxConfigurationError, SandboxNotFoundError } from "../errors"
import { captureLogs, makeMockProvider } from "../testing"

const setup = () => {
  const mock = makeMockProvider({ name: "daytona", initialSandboxes: [{ id: "sbx-1", state: "running" }] })
  const registry = Effect.runSync(
    makeProviderRegistry({
      factories: { daytona: Effect.succeed(mock.service) },
      defaultProvider: "daytona",
      providerName: Effect.succeed(undefined),
    }),
  )
  const logs = captureLogs()
  return { mock, logs, client: createSandboxClient(registry, logs.layer) }
}

describe("createSandboxClient", () => {
  it("resolves handles", async () => {
    const { client } = setup()

    const handle = await client.getOrStartSandbox("sbx-1")

    expect(handle.id).toBe("sbx-1")
    expect(handle.state).toBe("running")
  })

  it("creates sandboxes with the project label", async () => {
    const { client, mock } = setup()

    const handle = await client.createSandbox("pw123", "proj-9")

    expect(mock.sandboxes.get(handle.id)?.labels).toEqual({ id: "proj-9" })
  })

  it("returns the same provider every time", async () => {
    const { client, mock } = setup()

    expect(await client.provider()).toBe(mock.service)
    expect(await client.provider()).toBe(mock.service)
  })

  it("rejects with the tagged error itself", async () => {
    const { client } = setup()

    await expect(client.getOrStartSandbox("missing")).rejects.toBeInstanceOf(SandboxNotFoundError)
    await expect(client.getOrStartSandbox("missing")).rejects.toMatchObject({ _tag: "SandboxNotFound", id: "missing" })
  })

  it("rejects with SandboxConfiguration when the provider cannot be built", async () => {
    const registry = Effect.runSync(
      makeProviderRegistry({
        factories: { daytona: Effect.fail(new SandboxConfigurationError({ message: "no key" })) },
        defaultProvider: "daytona",
        providerName: Effect.succeed(undefined),
      }),
    )
    const client = createSandboxClient(registry, captureLogs().layer)

    await expect(client.createSandbox("pw123")).rejects.toBeInstanceOf(SandboxConfigurationError)
  })

  it("routes logs through the given layer", async () => {
    const { client, logs } = setup()

    await client.provider()

    expect(logs.messages()).toEqual(["Using sandbox provider: daytona"])
  })
})
