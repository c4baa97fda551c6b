import { parseBooleanFlag, parseNumericEnv } from "../env";

type RuntimeEnv = Record<string, string | undefined>;

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export const LOG_LEVELS: readonly LogLevel[] = [
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const resolveEnvironment = (env: RuntimeEnv): string => {
  const explicitEnv = env.APP_ENV?.trim();
  if (explicitEnv) {
    return explicitEnv;
  }

  const nodeEnv = env.NODE_ENV?.trim();
  if (nodeEnv) {
    return nodeEnv;
  }

  return "development";
};

const resolveLogLevel = (env: RuntimeEnv): LogLevel => {
  if (parseBooleanFlag(env.PROXIMITY_DEBUG, false)) {
    return "debug";
  }
  const requested = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
  return isLogLevel(requested) ? requested : "info";
};

const SENSITIVE_KEYS = [
  "password",
  "token",
  "secret",
  "authorization",
  "auth",
  "dsn",
  "email",
];

const isSensitiveKey = (key: string): boolean => {
  const lowerKey = key.toLowerCase();
  return SENSITIVE_KEYS.some((sensitiveKey) => lowerKey.includes(sensitiveKey));
};

/**
 * Replaces the value of every key that looks like a credential with
 * `[redacted]`, recursing into arrays and plain objects.
 */
export const scrubValue = (value: unknown): unknown => {
  if (value == null) {
    return value;
  }

  if (Array.isArray(value)) {
    return value.map((item) => scrubValue(item));
  }

  if (typeof value === "object") {
    const result: Record<string, unknown> = {};
    Object.entries(value).forEach(([key, nestedValue]) => {
      result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
    });
    return result;
  }

  return value;
};

export const scrubRecord = (
  record: Record<string, unknown>,
): Record<string, unknown> => {
  const result: Record<string, unknown> = {};
  Object.entries(record).forEach(([key, nestedValue]) => {
    result[key] = isSensitiveKey(key) ? "[redacted]" : scrubValue(nestedValue);
  });
  return result;
};

export type MonitoringConfig = {
  environment: string;
  release?: string;
  logLevel: LogLevel;
  sentry: {
    dsn: string;
    enabled: boolean;
    tracesSampleRate: number;
  };
  logtail: {
    token: string;
    enabled: boolean;
  };
};

export const resolveMonitoringConfig = (env: RuntimeEnv): MonitoringConfig => {
  const environment = resolveEnvironment(env);
  const isProductionLike =
    environment === "production" || environment === "staging";

  const sentryDsn = env.SENTRY_DSN ?? "";
  const logtailToken = env.BETTER_STACK_TOKEN ?? "";

  return {
    environment,
    release: env.npm_package_version,
    logLevel: resolveLogLevel(env),
    sentry: {
      dsn: sentryDsn,
      enabled:
        Boolean(sentryDsn) &&
        (isProductionLike || parseBooleanFlag(env.ENABLE_SENTRY_IN_DEV)),
      tracesSampleRate:
        parseNumericEnv(env.SENTRY_TRACES_SAMPLE_RATE, { min: 0, max: 1 }) ??
        0.1,
    },
    logtail: {
      token: logtailToken,
      enabled:
        Boolean(logtailToken) &&
        (isProductionLike || parseBooleanFlag(env.ENABLE_BETTER_STACK_IN_DEV)),
    },
  };
};

export const monitoringConfig: MonitoringConfig = resolveMonitoringConfig(
  typeof process !== "undefined" ? process.env : {},
);

