import { getEnvVar, parseNumericEnv } from "../../shared/env";

export type ProximityConfig = {
  /** Delay before the secondary sensor is re-checked after a conflicting reading. */
  secondaryPingIntervalMs: number;
  /** Default timeout of a one-shot proximity check. */
  checkTimeoutMs: number;
};

export type ProximityConfigOverrides = Partial<ProximityConfig>;

export const DEFAULT_PROXIMITY_CONFIG: Readonly<ProximityConfig> = {
  secondaryPingIntervalMs: 5000,
  checkTimeoutMs: 1000,
};

const MAX_INTERVAL_MS = 600_000;

const resolveProximityEnvConfig = (): ProximityConfigOverrides => {
  const overrides: ProximityConfigOverrides = {};

  const pingInterval = parseNumericEnv(
    getEnvVar("PROXIMITY_SECONDARY_PING_INTERVAL_MS"),
    { min: 1, max: MAX_INTERVAL_MS, integer: true },
  );
  if (pingInterval !== null) {
    overrides.secondaryPingIntervalMs = pingInterval;
  }

  const checkTimeout = parseNumericEnv(getEnvVar("PROXIMITY_CHECK_TIMEOUT_MS"), {
    min: 0,
    max: MAX_INTERVAL_MS,
    integer: true,
  });
  if (checkTimeout !== null) {
    overrides.checkTimeoutMs = checkTimeout;
  }

  return overrides;
};

/** Defaults, then environment overrides, then explicit overrides. */
export const getProximityConfig = (
  overrides: ProximityConfigOverrides = {},
): ProximityConfig => {
  const envConfig = resolveProximityEnvConfig();
  return {
    secondaryPingIntervalMs:
      overrides.secondaryPingIntervalMs ??
      envConfig.secondaryPingIntervalMs ??
      DEFAULT_PROXIMITY_CONFIG.secondaryPingIntervalMs,
    checkTimeoutMs:
      overrides.checkTimeoutMs ??
      envConfig.checkTimeoutMs ??
      DEFAULT_PROXIMITY_CONFIG.checkTimeoutMs,
  };
};
