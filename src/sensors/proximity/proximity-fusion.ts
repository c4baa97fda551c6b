import { getLogger } from "../../shared/logger";
import { captureException } from "../../shared/monitoring/sentry";
import {
  type ProximityConfig,
  type ProximityConfigOverrides,
  getProximityConfig,
} from "../config/proximity-config";
import { ConfinedExecution, type Execution } from "../execution";
import {
  type CancelHandle,
  type DelayableScheduler,
  TimerScheduler,
} from "../scheduler";
import { createAbsentThresholdSensor } from "../threshold-sensor";
import type {
  ThresholdSensor,
  ThresholdSensorEvent,
  ThresholdSensorListener,
} from "../types";

const logger = getLogger("proximity-fusion", "fusion");

export type ProximityFusionOptions = {
  primary: ThresholdSensor;
  /** Pass an unloaded sensor when the device has no secondary. */
  secondary: ThresholdSensor;
  scheduler: DelayableScheduler;
  execution: Execution;
  config?: ProximityConfigOverrides;
};

export type ProximitySnapshot = {
  registered: boolean;
  paused: boolean;
  near: boolean | null;
  secondarySafe: boolean;
  listenerCount: number;
  rearmPending: boolean;
  tag: string | null;
};

type FusionState = {
  lastPrimaryEvent: ThresholdSensorEvent | null;
  lastFusedEvent: ThresholdSensorEvent | null;
  registered: boolean;
  paused: boolean;
  secondarySafe: boolean;
  pendingSecondaryRearm: CancelHandle | null;
  listenersInitialized: boolean;
  alerting: boolean;
};

/**
 * Fuses a primary and a secondary threshold sensor into one proximity
 * signal.
 *
 * The primary is a cheap first pass. A "near" from the primary turns on the
 * secondary, and nothing is reported until the secondary confirms or rejects
 * it; when both are loaded the secondary is the source of truth. A "far" from
 * the primary is reported straight away so the secondary can go back to
 * sleep. Callers that can afford to keep the secondary on permanently use
 * {@link ProximityFusion.setSecondarySafe}.
 *
 * All methods and sensor callbacks must run on the owning {@link Execution}.
 */
export class ProximityFusion implements ThresholdSensor {
  private readonly primary: ThresholdSensor;

  private readonly secondary: ThresholdSensor;

  private readonly scheduler: DelayableScheduler;

  private readonly execution: Execution;

  private readonly config: ProximityConfig;

  private readonly listeners = new Set<ThresholdSensorListener>();

  private tag: string | null = null;

  private readonly state: FusionState = {
    lastPrimaryEvent: null,
    lastFusedEvent: null,
    registered: false,
    paused: false,
    secondarySafe: false,
    pendingSecondaryRearm: null,
    listenersInitialized: false,
    alerting: false,
  };

  constructor(options: ProximityFusionOptions) {
    this.primary = options.primary;
    this.secondary = options.secondary;
    this.scheduler = options.scheduler;
    this.execution = options.execution;
    this.config = getProximityConfig(options.config);
  }

  setTag(tag: string): void {
    this.tag = tag;
    this.primary.setTag(`${tag}:primary`);
    this.secondary.setTag(`${tag}:secondary`);
  }

  setDelay(samplingDelay: number): void {
    this.execution.assertIsMainThread();
    this.primary.setDelay(samplingDelay);
    this.secondary.setDelay(samplingDelay);
  }

  /** Stops sampling without dropping listeners. Forgets the last readings. */
  pause(): void {
    this.execution.assertIsMainThread();
    this.state.paused = true;
    this.unregisterInternal();
  }

  /** Starts sampling again. Does nothing until a listener is registered. */
  resume(): void {
    this.execution.assertIsMainThread();
    this.state.paused = false;
    this.registerInternal();
  }

  /**
   * When safe, the secondary stays on whatever the primary reports. When not,
   * it only runs while a "near" from the primary awaits confirmation.
   */
  setSecondarySafe(safe: boolean): void {
    this.execution.assertIsMainThread();
    this.state.secondarySafe = safe;
    if (safe) {
      this.secondary.resume();
    } else {
      this.secondary.pause();
    }
  }

  isSecondarySafe(): boolean {
    return this.state.secondarySafe;
  }

  isRegistered(): boolean {
    return this.state.registered;
  }

  isPaused(): boolean {
    return this.state.paused;
  }

  isLoaded(): boolean {
    return this.primary.isLoaded();
  }

  register(listener: ThresholdSensorListener): void {
    this.execution.assertIsMainThread();
    if (!this.isLoaded()) {
      return;
    }

    if (this.listeners.has(listener)) {
      this.logDebug("Proximity listener registered multiple times");
    } else {
      this.listeners.add(listener);
    }
    this.registerInternal();
  }

  unregister(listener: ThresholdSensorListener): void {
    this.execution.assertIsMainThread();
    this.listeners.delete(listener);
    if (this.listeners.size === 0) {
      this.unregisterInternal();
    }
  }

  /** Null until a fused reading arrives after the sensor was (re)registered. */
  isNear(): boolean | null {
    if (!this.isLoaded() || !this.state.lastFusedEvent) {
      return null;
    }
    return this.state.lastFusedEvent.below;
  }

  /** Sends the last fused reading to every listener again. */
  alertListeners(): void {
    this.execution.assertIsMainThread();
    if (this.state.alerting) {
      return;
    }
    this.state.alerting = true;

    try {
      const lastEvent = this.state.lastFusedEvent;
      if (!lastEvent) {
        return;
      }
      // Listeners may unregister themselves, or null out the last event.
      const listeners = [...this.listeners];
      listeners.forEach((listener) => {
        try {
          listener(lastEvent);
        } catch (error) {
          logger.error(this.prefix("Proximity listener threw"), {
            error: error instanceof Error ? error.message : String(error),
          });
          captureException(error, { tag: this.tag });
        }
      });
    } finally {
      this.state.alerting = false;
    }
  }

  getSnapshot(): ProximitySnapshot {
    return {
      registered: this.state.registered,
      paused: this.state.paused,
      near: this.isNear(),
      secondarySafe: this.state.secondarySafe,
      listenerCount: this.listeners.size,
      rearmPending: this.state.pendingSecondaryRearm !== null,
      tag: this.tag,
    };
  }

  toString(): string {
    const { registered, paused, near, secondarySafe } = this.getSnapshot();
    return `{registered=${registered}, paused=${paused}, near=${near}, primarySensor=${String(this.primary)}, secondarySensor=${String(this.secondary)} secondarySafe=${secondarySafe}}`;
  }

  protected registerInternal(): void {
    this.execution.assertIsMainThread();
    if (this.state.registered || this.state.paused || this.listeners.size === 0) {
      return;
    }

    if (!this.state.listenersInitialized) {
      this.primary.register(this.onPrimarySensorEvent);
      if (!this.state.secondarySafe) {
        this.secondary.pause();
      }
      this.secondary.register(this.onSecondarySensorEvent);
      this.state.listenersInitialized = true;
    }

    this.logDebug("Registering sensor listener");
    this.primary.resume();
    this.state.registered = true;
  }

  protected unregisterInternal(): void {
    this.execution.assertIsMainThread();
    if (!this.state.registered) {
      return;
    }

    this.logDebug("Unregistering sensor listener");
    this.primary.pause();
    this.secondary.pause();
    this.cancelSecondaryRearm();
    this.state.lastPrimaryEvent = null;
    this.state.lastFusedEvent = null;
    this.state.registered = false;
  }

  private readonly onPrimarySensorEvent = (event: ThresholdSensorEvent): void => {
    this.execution.assertIsMainThread();
    const previous = this.state.lastPrimaryEvent;
    if (previous && previous.below === event.below) {
      return;
    }

    this.state.lastPrimaryEvent = event;

    if (this.state.secondarySafe && this.secondary.isLoaded()) {
      this.logDebug(
        `Primary sensor reported ${event.below ? "near" : "far"}. Checking secondary.`,
      );
      if (!this.state.pendingSecondaryRearm) {
        this.secondary.resume();
      }
      return;
    }

    if (!this.secondary.isLoaded()) {
      this.logDebug(`Primary sensor event: ${event.below}. No secondary.`);
      this.onSensorEvent(event);
    } else if (event.below) {
      // Covered. Wait for the secondary to confirm.
      this.logDebug(`Primary sensor event: ${event.below}. Checking secondary.`);
      this.cancelSecondaryRearm();
      this.secondary.resume();
    } else {
      // Uncovered. Report immediately.
      this.onSensorEvent(event);
    }
  };

  private readonly onSecondarySensorEvent = (
    event: ThresholdSensorEvent,
  ): void => {
    this.execution.assertIsMainThread();
    const primary = this.state.lastPrimaryEvent;
    const primaryNear = primary?.below === true;

    if (!this.state.secondarySafe && (!primaryNear || !event.below)) {
      this.secondary.pause();
      if (!primaryNear) {
        // Only keep checking while the primary thinks something is near.
        this.cancelSecondaryRearm();
        return;
      }
      this.scheduleSecondaryRearm();
    }

    this.logDebug(`Secondary sensor event: ${event.below}.`);

    if (!this.state.paused) {
      this.onSensorEvent(event);
    }
  };

  private onSensorEvent(event: ThresholdSensorEvent): void {
    this.execution.assertIsMainThread();
    const previous = this.state.lastFusedEvent;
    if (previous && previous.below === event.below) {
      return;
    }

    if (!this.state.secondarySafe && !event.below) {
      this.secondary.pause();
    }

    this.state.lastFusedEvent = event;
    this.alertListeners();
  }

  private scheduleSecondaryRearm(): void {
    this.cancelSecondaryRearm();
    const handle = this.scheduler.scheduleAfterDelay(
      this.config.secondaryPingIntervalMs,
      () => {
        this.execution.assertIsMainThread();
        if (this.state.pendingSecondaryRearm === handle) {
          this.state.pendingSecondaryRearm = null;
        }
        this.logDebug("Re-checking secondary sensor");
        this.secondary.resume();
      },
    );
    this.state.pendingSecondaryRearm = handle;
  }

  private cancelSecondaryRearm(): void {
    const pending = this.state.pendingSecondaryRearm;
    if (!pending) {
      return;
    }
    this.scheduler.cancel(pending);
    this.state.pendingSecondaryRearm = null;
  }

  private logDebug(message: string): void {
    logger.debug(this.prefix(message));
  }

  private prefix(message: string): string {
    return this.tag ? `[${this.tag}] ${message}` : message;
  }
}

export type CreateProximityFusionOptions = Pick<
  ProximityFusionOptions,
  "primary" | "config"
> &
  Partial<Pick<ProximityFusionOptions, "secondary" | "scheduler" | "execution">>;

/**
 * Wires a fusion sensor with Node timers and confinement to the calling
 * thread. Without a secondary the primary's readings pass straight through.
 */
export const createProximityFusion = (
  options: CreateProximityFusionOptions,
): ProximityFusion => {
  return new ProximityFusion({
    primary: options.primary,
    secondary: options.secondary ?? createAbsentThresholdSensor(),
    scheduler: options.scheduler ?? new TimerScheduler(),
    execution: options.execution ?? new ConfinedExecution(),
    config: options.config,
  });
};
