import { getLogger } from "../../shared/logger";
import {
  type ProximityConfigOverrides,
  getProximityConfig,
} from "../config/proximity-config";
import type { CancelHandle, DelayableScheduler } from "../scheduler";
import type { ThresholdSensorEvent } from "../types";
import type { ProximityFusion } from "./proximity-fusion";

const logger = getLogger("proximity-check", "probe");

export type ProximityCheckCallback = (near: boolean | null) => void;

type ProximityCheckSensor = Pick<
  ProximityFusion,
  "isLoaded" | "register" | "unregister" | "setTag"
>;

/**
 * Briefly samples a fused proximity sensor. Callers that arrive while a
 * check is in flight share its registration and all receive the same
 * answer: `true`/`false`, or `null` on timeout or missing hardware.
 */
export class ProximityCheck {
  private readonly sensor: ProximityCheckSensor;

  private readonly scheduler: DelayableScheduler;

  private readonly defaultTimeoutMs: number;

  private callbacks: ProximityCheckCallback[] = [];

  private registered = false;

  private timeout: CancelHandle | null = null;

  constructor(
    sensor: ProximityCheckSensor,
    scheduler: DelayableScheduler,
    config: ProximityConfigOverrides = {},
  ) {
    this.sensor = sensor;
    this.scheduler = scheduler;
    this.defaultTimeoutMs = getProximityConfig(config).checkTimeoutMs;
    this.sensor.setTag("prox_check");
  }

  setTag(tag: string): void {
    this.sensor.setTag(tag);
  }

  isChecking(): boolean {
    return this.registered;
  }

  check(timeoutMs: number, callback: ProximityCheckCallback): void {
    if (!this.sensor.isLoaded()) {
      callback(null);
      return;
    }

    this.callbacks.push(callback);
    if (this.registered) {
      return;
    }

    this.registered = true;
    // Armed first: the sensor may answer from inside register(), and the
    // answer must cancel this check's own timer.
    this.timeout = this.scheduler.scheduleAfterDelay(
      timeoutMs,
      this.onTimeout,
      { unref: false },
    );
    this.sensor.register(this.onProximityEvent);
  }

  query(timeoutMs: number = this.defaultTimeoutMs): Promise<boolean | null> {
    return new Promise((resolve) => {
      this.check(timeoutMs, resolve);
    });
  }

  private readonly onTimeout = (): void => {
    this.timeout = null;
    logger.debug("Proximity check timed out", {
      pendingCallbacks: this.callbacks.length,
    });
    this.resolve(null);
  };

  private readonly onProximityEvent = (event: ThresholdSensorEvent): void => {
    this.resolve(event.below);
  };

  private resolve(near: boolean | null): void {
    const callbacks = this.callbacks;
    this.callbacks = [];
    this.unregister();
    callbacks.forEach((callback) => callback(near));
  }

  private unregister(): void {
    if (this.timeout) {
      this.scheduler.cancel(this.timeout);
      this.timeout = null;
    }
    this.sensor.unregister(this.onProximityEvent);
    this.registered = false;
  }
}
