import { describe, it, expect } from "vitest"
import { Effect } from "effect"
import { getOrStartSandbox } from "../../provider"
import { MockProviderLive, makeMockProvider } from "../mock-provider"

describe("Mock provider", () => {
  it("resolves a running sandbox without a start", async () => {
    const mock = makeMockProvider({ initialSandboxes: [{ id: "sbx-1", state: "running" }] })

    const handle = await Effect.runPromise(mock.service.getOrStartSandbox("sbx-1"))

    expect(handle.state).toBe("running")
    expect(mock.calls).toEqual([{ operation: "getOrStartSandbox", sandboxId: "sbx-1" }])
  })

  it("starts and bootstraps a stopped sandbox", async () => {
    const mock = makeMockProvider({ initialSandboxes: [{ id: "sbx-2", state: "stopped" }] })

    const handle = await Effect.runPromise(mock.service.getOrStartSandbox("sbx-2"))

    expect(handle.state).toBe("running")
    expect(mock.calls.map((call) => call.operation)).toEqual(["getOrStartSandbox", "start", "startSupervisordSession"])
  })

  it("fails configured operations", async () => {
    const mock = makeMockProvider({ failOperations: { createSandbox: true }, errorMessage: "quota exceeded" })

    const error = await Effect.runPromise(Effect.flip(mock.service.createSandbox("pw123")))

    expect(error._tag).toBe("SandboxProvisioning")
    expect(mock.sandboxes.size).toBe(0)
  })

  it("is available as the SandboxProvider service", async () => {
    const handle = await Effect.runPromise(
      getOrStartSandbox("sbx-1").pipe(
        Effect.provide(MockProviderLive({ initialSandboxes: [{ id: "sbx-1", state: "archived" }] })),
      ),
    )

    expect(handle.state).toBe("running")
    expect(handle.provider).toBe("mock")
  })
})
