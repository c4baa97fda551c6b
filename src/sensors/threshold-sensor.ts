import { getLogger } from "../shared/logger";
import { resolveTimestampNanos } from "../shared/time";
import type { Execution } from "./execution";
import {
  type ThresholdSensor,
  type ThresholdSensorListener,
  createThresholdSensorEvent,
} from "./types";

const logger = getLogger("threshold-sensor", "sensor");

export type SensorSample = {
  value: number;
  timestampNanos?: bigint;
};

export type SampleHandler = (sample: SensorSample) => void;

/**
 * Hardware driver seam. `subscribe` starts sampling at the requested delay
 * and returns the function that stops it.
 */
export interface SensorSampleSource {
  readonly name: string;
  subscribe(onSample: SampleHandler, samplingDelay: number): () => void;
}

export type HysteresisThresholdSensorOptions = {
  /** Missing source means the hardware is absent. */
  source?: SensorSampleSource | null;
  threshold: number;
  /** Reading at or above which the sensor reports "above". Defaults to `threshold`. */
  thresholdLatch?: number;
  samplingDelay?: number;
  execution?: Execution;
};

export const DEFAULT_SAMPLING_DELAY = 3;

export class HysteresisThresholdSensor implements ThresholdSensor {
  private readonly source: SensorSampleSource | null;

  private readonly threshold: number;

  private readonly thresholdLatch: number;

  private readonly execution?: Execution;

  private readonly listeners = new Set<ThresholdSensorListener>();

  private samplingDelay: number;

  private tag: string | null = null;

  private paused = false;

  private sampling = false;

  private samplingGeneration = 0;

  private stopSampling: (() => void) | null = null;

  private lastBelow: boolean | null = null;

  constructor(options: HysteresisThresholdSensorOptions) {
    const thresholdLatch = options.thresholdLatch ?? options.threshold;
    if (!Number.isFinite(options.threshold) || !Number.isFinite(thresholdLatch)) {
      throw new RangeError("Sensor thresholds must be finite numbers");
    }
    if (thresholdLatch < options.threshold) {
      throw new RangeError(
        `Threshold latch ${thresholdLatch} is below threshold ${options.threshold}`,
      );
    }

    this.source = options.source ?? null;
    this.threshold = options.threshold;
    this.thresholdLatch = thresholdLatch;
    this.samplingDelay = options.samplingDelay ?? DEFAULT_SAMPLING_DELAY;
    this.execution = options.execution;
  }

  setTag(tag: string): void {
    this.tag = tag;
  }

  setDelay(samplingDelay: number): void {
    this.execution?.assertIsMainThread();
    if (samplingDelay === this.samplingDelay) {
      return;
    }
    this.samplingDelay = samplingDelay;
    if (this.sampling) {
      this.releaseSubscription();
      this.startSampling();
    }
  }

  pause(): void {
    this.execution?.assertIsMainThread();
    this.paused = true;
    this.updateSampling();
  }

  resume(): void {
    this.execution?.assertIsMainThread();
    this.paused = false;
    this.updateSampling();
  }

  isLoaded(): boolean {
    return this.source !== null;
  }

  isSampling(): boolean {
    return this.sampling;
  }

  register(listener: ThresholdSensorListener): void {
    this.execution?.assertIsMainThread();
    if (!this.isLoaded()) {
      return;
    }
    if (this.listeners.has(listener)) {
      logger.warn(this.prefix("Listener registered multiple times"));
    } else {
      this.listeners.add(listener);
    }
    this.updateSampling();
  }

  unregister(listener: ThresholdSensorListener): void {
    this.execution?.assertIsMainThread();
    this.listeners.delete(listener);
    this.updateSampling();
  }

  toString(): string {
    return `{source=${this.source?.name ?? "none"}, threshold=${this.threshold}, thresholdLatch=${this.thresholdLatch}, delay=${this.samplingDelay}, sampling=${this.isSampling()}, paused=${this.paused}}`;
  }

  private updateSampling(): void {
    const shouldSample =
      this.isLoaded() && !this.paused && this.listeners.size > 0;

    if (shouldSample && !this.sampling) {
      this.startSampling();
      return;
    }

    if (!shouldSample && this.sampling) {
      logger.debug(this.prefix("Stopping sensor sampling"));
      this.sampling = false;
      this.lastBelow = null;
      this.releaseSubscription();
    }
  }

  private startSampling(): void {
    if (!this.source) {
      return;
    }
    logger.debug(this.prefix("Starting sensor sampling"), {
      samplingDelay: this.samplingDelay,
    });
    this.sampling = true;
    const generation = ++this.samplingGeneration;
    // Drivers may report their current reading from inside subscribe().
    const stop = this.source.subscribe(this.onSample, this.samplingDelay);
    if (generation !== this.samplingGeneration) {
      // Stopped or restarted while subscribing.
      stop();
      return;
    }
    this.stopSampling = stop;
  }

  private releaseSubscription(): void {
    this.samplingGeneration += 1;
    const stop = this.stopSampling;
    this.stopSampling = null;
    stop?.();
  }

  private readonly onSample = (sample: SensorSample): void => {
    this.execution?.assertIsMainThread();
    if (!this.sampling || !Number.isFinite(sample.value)) {
      return;
    }

    const below = sample.value < this.threshold;
    const above = sample.value >= this.thresholdLatch;
    if (!below && !above) {
      return;
    }
    if (this.lastBelow === below) {
      return;
    }

    this.lastBelow = below;
    const event = createThresholdSensorEvent(
      below,
      resolveTimestampNanos(sample.timestampNanos),
    );
    [...this.listeners].forEach((listener) => listener(event));
  };

  private prefix(message: string): string {
    return this.tag ? `[${this.tag}] ${message}` : message;
  }
}

const noop = (): void => undefined;

/** Stands in for hardware that is not present. Never calls back. */
export const createAbsentThresholdSensor = (): ThresholdSensor => {
  const absent = {
    setTag: noop,
    setDelay: noop,
    pause: noop,
    resume: noop,
    isLoaded: () => false,
    register: noop,
    unregister: noop,
    toString: () => "{absent}",
  };
  return absent;
};
