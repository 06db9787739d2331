import type { SandboxCreateRequest, SandboxResources } from "./types"

export const DEFAULT_RESOURCES: Readonly<SandboxResources> = { cpu: 2, memory: 4, disk: 5 }

/**
 * Environment for the embedded browser and remote display.
 * The values are opaque to the lifecycle layer; only the password varies.
 */
export const browserEnvironment = (password: string): Record<string, string> => ({
  CHROME_PERSISTENT_SESSION: "true",
  RESOLUTION: "1024x768x24",
  RESOLUTION_WIDTH: "1024",
  RESOLUTION_HEIGHT: "768",
  VNC_PASSWORD: password,
  ANONYMIZED_TELEMETRY: "false",
  CHROME_PATH: "",
  CHROME_USER_DATA: "",
  CHROME_DEBUGGING_PORT: "9222",
  CHROME_DEBUGGING_HOST: "localhost",
  CHROME_CDP: "",
})

/**
 * Build the creation request shared by all providers.
 * A project id becomes the `id` label; without one no labels are attached.
 */
export const buildCreateRequest = (image: string, password: string, projectId?: string): SandboxCreateRequest => ({
  image,
  resources: { ...DEFAULT_RESOURCES },
  env: browserEnvironment(password),
  ...(projectId ? { labels: { id: projectId } } : {}),
})
