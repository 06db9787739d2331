export {
  E2BProviderFromEnv,
  makeE2BProvider,
  type E2BHandle,
  type E2BPlaceholderInstance,
  type E2BProviderService,
} from "./provider"
