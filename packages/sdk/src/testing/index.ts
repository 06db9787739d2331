/**
 * Testing utilities for sandbox lifecycle packages.
 *
 * @example
 * ```ts
 * import { makeMockProvider, captureLogs } from "@sandbox-lifecycle/sdk/testing"
 * ```
 */

export {
  makeMockProvider,
  MockProviderLive,
  type MockProvider,
  type MockProviderCall,
  type MockProviderConfig,
  type MockSandboxState,
} from "./mock-provider"

export { captureLogs, type CapturedLog } from "./logs"
