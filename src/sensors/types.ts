/** A single threshold crossing reported by a sensor. */
export type ThresholdSensorEvent = Readonly<{
  /** True when the reading fell below the sensor's threshold (object near). */
  below: boolean;
  /** Monotonic sample time. Carried for consumers, never compared. */
  timestampNanos: bigint;
}>;

export type ThresholdSensorListener = (event: ThresholdSensorEvent) => void;

/**
 * A binary-threshold sensor. Implementations deliver every callback on the
 * confinement context of their owner.
 */
export interface ThresholdSensor {
  setTag(tag: string): void;

  setDelay(samplingDelay: number): void;

  /** Stops hardware sampling without dropping listeners. Idempotent. */
  pause(): void;

  /** Restarts hardware sampling if listeners are present. Idempotent. */
  resume(): void;

  /** Whether the underlying hardware exists. An unloaded sensor never calls back. */
  isLoaded(): boolean;

  register(listener: ThresholdSensorListener): void;

  unregister(listener: ThresholdSensorListener): void;
}

export const createThresholdSensorEvent = (
  below: boolean,
  timestampNanos: bigint,
): ThresholdSensorEvent => Object.freeze({ below, timestampNanos });
