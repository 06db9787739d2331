// ─────────────────────────────────────────────────────────────────────────────
// Promise-based API
// ─────────────────────────────────────────────────────────────────────────────
export { createSandboxClient, type SandboxClient } from "./client"

// ─────────────────────────────────────────────────────────────────────────────
// Types & creation envelope
// ─────────────────────────────────────────────────────────────────────────────
export * from "./types"
export { DEFAULT_RESOURCES, browserEnvironment, buildCreateRequest } from "./envelope"
export { SUPERVISORD_SESSION_ID, SUPERVISORD_CONFIG_PATH, SUPERVISORD_COMMAND } from "./session"

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export * from "./errors"
export { retryTransient, withRetry, type RetryConfig } from "./retry"

// ─────────────────────────────────────────────────────────────────────────────
// Effect-based API
// ─────────────────────────────────────────────────────────────────────────────
export {
  SandboxProvider,
  type SandboxProviderService,
  createSandbox,
  getOrStartSandbox,
  startSupervisordSession,
} from "./provider"
export {
  makeProviderRegistry,
  configuredProviderName,
  SandboxProviderFromRegistry,
  type ProviderFactory,
  type ProviderRegistry,
  type ProviderRegistryOptions,
} from "./registry"
export { LoggingLive } from "./logging"
