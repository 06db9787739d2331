export {
  DaytonaProviderFromEnv,
  makeDaytonaProvider,
  normalizeState,
  type DaytonaHandle,
  type DaytonaProviderService,
} from "./provider"
export {
  DEFAULT_DAYTONA_BASE_URL,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_START_TIMEOUT_MS,
  loadDaytonaConfig,
  type DaytonaConfig,
} from "./config"
export { createClient, type DaytonaClient } from "./client"
export { DaytonaSandbox } from "./api"
