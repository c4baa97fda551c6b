export * from "./sensors";

export { loadEnvironment, type LoadEnvironmentOptions } from "./shared/env";
export { getLogger, type Logger, type LoggerScope } from "./shared/logger";
export {
  captureException,
  initSentry,
  isSentryInitialised,
} from "./shared/monitoring/sentry";
