import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ConfinementViolationError } from "../../errors";
import { ConfinedExecution } from "../../execution";
import { TimerScheduler } from "../../scheduler";
import type { ThresholdSensorEvent } from "../../types";
import { FakeThresholdSensor } from "../../__tests__/helpers/fake-threshold-sensor";
import { ProximityFusion } from "../proximity-fusion";

const { loggerMock } = vi.hoisted(() => ({
  loggerMock: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    flush: vi.fn(),
  },
}));

vi.mock("../../../shared/logger", () => ({
  getLogger: () => loggerMock,
}));

const createFusion = (
  primary: FakeThresholdSensor,
  secondary: FakeThresholdSensor,
): ProximityFusion => {
  return new ProximityFusion({
    primary,
    secondary,
    scheduler: new TimerScheduler(),
    execution: new ConfinedExecution(),
    config: { secondaryPingIntervalMs: 5000 },
  });
};

describe("ProximityFusion", () => {
  let primary: FakeThresholdSensor;
  let secondary: FakeThresholdSensor;
  let fusion: ProximityFusion;
  let received: boolean[];
  const listener = (event: ThresholdSensorEvent) => {
    received.push(event.below);
  };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    primary = new FakeThresholdSensor();
    secondary = new FakeThresholdSensor();
    fusion = createFusion(primary, secondary);
    received = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe("registration", () => {
    it("subscribes both sensors once and keeps the secondary dormant", () => {
      fusion.register(listener);

      expect(fusion.isRegistered()).toBe(true);
      expect(primary.listeners).toHaveLength(1);
      expect(secondary.listeners).toHaveLength(1);
      expect(primary.resumeCount).toBe(1);
      expect(secondary.isPaused()).toBe(true);
      expect(secondary.resumeCount).toBe(0);
    });

    it("ignores listeners when the primary sensor is missing", () => {
      const missing = new FakeThresholdSensor(false);
      const unavailable = createFusion(missing, secondary);

      unavailable.register(listener);

      expect(unavailable.isLoaded()).toBe(false);
      expect(unavailable.isRegistered()).toBe(false);
      expect(missing.listeners).toHaveLength(0);
      expect(unavailable.isNear()).toBeNull();
    });

    it("logs and ignores a duplicate registration", () => {
      fusion.register(listener);
      fusion.register(listener);

      expect(fusion.getSnapshot().listenerCount).toBe(1);
      expect(primary.resumeCount).toBe(1);
      expect(loggerMock.debug).toHaveBeenCalledWith(
        "Proximity listener registered multiple times",
      );
    });

    it("does not subscribe the hardware twice across register cycles", () => {
      fusion.register(listener);
      fusion.unregister(listener);
      fusion.register(listener);

      expect(primary.listeners).toHaveLength(1);
      expect(secondary.listeners).toHaveLength(1);
      expect(primary.resumeCount).toBe(2);
      expect(primary.pauseCount).toBe(1);
    });

    it("forwards tags and sampling delay to both sensors", () => {
      fusion.setTag("doze");
      fusion.setDelay(5);

      expect(primary.tag).toBe("doze:primary");
      expect(secondary.tag).toBe("doze:secondary");
      expect(primary.delay).toBe(5);
      expect(secondary.delay).toBe(5);
      expect(fusion.getSnapshot().tag).toBe("doze");
    });
  });

  describe("near confirmation", () => {
    it("waits for the secondary before reporting near", () => {
      fusion.register(listener);

      primary.triggerEvent(true);

      expect(received).toEqual([]);
      expect(secondary.isPaused()).toBe(false);
      expect(fusion.isNear()).toBeNull();

      secondary.triggerEvent(true);

      expect(received).toEqual([true]);
      expect(fusion.isNear()).toBe(true);
    });

    it("delivers one confirmed event to every listener", () => {
      const other: boolean[] = [];
      fusion.register(listener);
      fusion.register((event) => other.push(event.below));

      primary.triggerEvent(true);
      secondary.triggerEvent(true);

      expect(received).toEqual([true]);
      expect(other).toEqual([true]);
    });

    it("rejects a near reading the secondary contradicts and re-arms it", () => {
      fusion.register(listener);
      primary.triggerEvent(false);
      expect(received).toEqual([false]);

      primary.triggerEvent(true);
      secondary.triggerEvent(false);

      expect(received).toEqual([false]);
      expect(secondary.isPaused()).toBe(true);
      expect(fusion.getSnapshot().rearmPending).toBe(true);

      vi.advanceTimersByTime(4999);
      expect(secondary.isPaused()).toBe(true);

      vi.advanceTimersByTime(1);
      expect(secondary.isPaused()).toBe(false);
      expect(fusion.getSnapshot().rearmPending).toBe(false);
    });

    it("reports the secondary's far as the first reading when none exists yet", () => {
      fusion.register(listener);

      primary.triggerEvent(true);
      secondary.triggerEvent(false);

      expect(received).toEqual([false]);
      expect(fusion.isNear()).toBe(false);
      expect(secondary.isPaused()).toBe(true);
      expect(fusion.getSnapshot().rearmPending).toBe(true);
    });

    it("keeps a single re-arm task when rejections repeat", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      secondary.triggerEvent(false);
      vi.advanceTimersByTime(2000);
      secondary.triggerEvent(false);

      expect(vi.getTimerCount()).toBe(1);

      vi.advanceTimersByTime(3000);
      expect(secondary.isPaused()).toBe(true);

      vi.advanceTimersByTime(2000);
      expect(secondary.isPaused()).toBe(false);
    });

    it("stops checking the secondary when the primary has no near reading", () => {
      fusion.register(listener);

      secondary.triggerEvent(true);

      expect(received).toEqual([]);
      expect(secondary.isPaused()).toBe(true);
      expect(vi.getTimerCount()).toBe(0);
    });
  });

  describe("far reporting", () => {
    it("reports far from the primary without waking the secondary", () => {
      fusion.register(listener);

      primary.triggerEvent(false);

      expect(received).toEqual([false]);
      expect(fusion.isNear()).toBe(false);
      expect(secondary.resumeCount).toBe(0);
    });

    it("reports far eagerly after a confirmed near and sleeps the secondary", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      secondary.triggerEvent(true);

      primary.triggerEvent(false);

      expect(received).toEqual([true, false]);
      expect(secondary.isPaused()).toBe(true);
    });
  });

  describe("debounce", () => {
    it("only acts on the first of a run of identical primary readings", () => {
      fusion.register(listener);

      primary.triggerEvent(true);
      primary.triggerEvent(true);
      primary.triggerEvent(true);

      expect(secondary.resumeCount).toBe(1);
    });

    it("never emits the same polarity twice in a row", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      secondary.triggerEvent(true);
      secondary.triggerEvent(true);

      expect(received).toEqual([true]);
    });
  });

  describe("without a secondary sensor", () => {
    it("passes every debounced primary reading straight through", () => {
      const absent = new FakeThresholdSensor(false);
      const primaryOnly = createFusion(primary, absent);
      primaryOnly.register(listener);

      primary.triggerEvent(true);
      primary.triggerEvent(true);
      primary.triggerEvent(false);

      expect(received).toEqual([true, false]);
      expect(absent.resumeCount).toBe(0);
    });
  });

  describe("teardown and pause", () => {
    it("forgets readings once the last listener leaves", () => {
      fusion.register(listener);
      primary.triggerEvent(false);
      expect(fusion.isNear()).toBe(false);

      fusion.unregister(listener);

      expect(fusion.isRegistered()).toBe(false);
      expect(fusion.isNear()).toBeNull();
      expect(primary.isPaused()).toBe(true);
      expect(secondary.isPaused()).toBe(true);

      fusion.register(listener);
      expect(fusion.isNear()).toBeNull();

      primary.triggerEvent(false);
      expect(fusion.isNear()).toBe(false);
    });

    it("keeps sampling while other listeners remain", () => {
      const other = () => undefined;
      fusion.register(listener);
      fusion.register(other);
      primary.triggerEvent(false);

      fusion.unregister(other);

      expect(fusion.isRegistered()).toBe(true);
      expect(fusion.isNear()).toBe(false);
    });

    it("cancels a pending re-arm when unregistered", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      secondary.triggerEvent(false);
      expect(secondary.resumeCount).toBe(1);

      fusion.unregister(listener);
      vi.advanceTimersByTime(5000);

      expect(secondary.resumeCount).toBe(1);
      expect(fusion.getSnapshot().rearmPending).toBe(false);
    });

    it("pauses without losing listeners and resumes on request", () => {
      fusion.register(listener);
      primary.triggerEvent(false);

      fusion.pause();

      expect(fusion.isPaused()).toBe(true);
      expect(fusion.isRegistered()).toBe(false);
      expect(fusion.isNear()).toBeNull();
      expect(fusion.getSnapshot().listenerCount).toBe(1);
      expect(primary.isPaused()).toBe(true);

      fusion.register(listener);
      expect(fusion.isRegistered()).toBe(false);

      fusion.resume();

      expect(fusion.isRegistered()).toBe(true);
      expect(primary.resumeCount).toBe(2);

      primary.triggerEvent(true);
      secondary.triggerEvent(true);
      expect(received).toEqual([false, true]);
    });

    it("drops secondary readings while paused", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      fusion.pause();

      secondary.triggerEvent(true);

      expect(received).toEqual([]);
    });
  });

  describe("secondary-safe mode", () => {
    it("resumes the secondary immediately while registered", () => {
      fusion.register(listener);
      expect(secondary.isPaused()).toBe(true);

      fusion.setSecondarySafe(true);

      expect(fusion.isSecondarySafe()).toBe(true);
      expect(secondary.isPaused()).toBe(false);
    });

    it("waits for the secondary even on far readings and keeps it on", () => {
      fusion.register(listener);
      fusion.setSecondarySafe(true);

      primary.triggerEvent(false);
      expect(received).toEqual([]);

      secondary.triggerEvent(false);

      expect(received).toEqual([false]);
      expect(secondary.isPaused()).toBe(false);
    });

    it("does not resume the secondary while a re-arm is pending", () => {
      fusion.register(listener);
      primary.triggerEvent(true);
      secondary.triggerEvent(false);
      fusion.setSecondarySafe(true);
      expect(secondary.resumeCount).toBe(2);

      primary.triggerEvent(false);

      expect(secondary.resumeCount).toBe(2);
    });

    it("pauses the secondary when switched off", () => {
      fusion.register(listener);
      fusion.setSecondarySafe(true);

      fusion.setSecondarySafe(false);

      expect(secondary.isPaused()).toBe(true);
    });
  });

  describe("alertListeners", () => {
    it("runs a single broadcast when a listener re-enters it", () => {
      const absent = new FakeThresholdSensor(false);
      const primaryOnly = createFusion(primary, absent);
      let calls = 0;
      primaryOnly.register(() => {
        calls += 1;
        primaryOnly.alertListeners();
      });

      primary.triggerEvent(true);
      expect(calls).toBe(1);

      primaryOnly.alertListeners();
      expect(calls).toBe(2);
    });

    it("lets a listener unregister itself during a broadcast", () => {
      const absent = new FakeThresholdSensor(false);
      const primaryOnly = createFusion(primary, absent);
      const once: boolean[] = [];
      const onceListener = (event: ThresholdSensorEvent) => {
        once.push(event.below);
        primaryOnly.unregister(onceListener);
      };
      primaryOnly.register(onceListener);
      primaryOnly.register(listener);

      primary.triggerEvent(true);
      primary.triggerEvent(false);

      expect(once).toEqual([true]);
      expect(received).toEqual([true, false]);
    });

    it("keeps notifying after a listener throws", () => {
      const absent = new FakeThresholdSensor(false);
      const primaryOnly = createFusion(primary, absent);
      primaryOnly.register(() => {
        throw new Error("listener failure");
      });
      primaryOnly.register(listener);

      primary.triggerEvent(true);
      primaryOnly.alertListeners();

      expect(received).toEqual([true, true]);
      expect(loggerMock.error).toHaveBeenCalledTimes(2);
    });

    it("does nothing before a fused reading exists", () => {
      fusion.register(listener);

      fusion.alertListeners();

      expect(received).toEqual([]);
    });
  });

  describe("confinement", () => {
    it("rejects calls from another thread", () => {
      const foreign = new ProximityFusion({
        primary,
        secondary,
        scheduler: new TimerScheduler(),
        execution: new ConfinedExecution({
          ownerThreadId: 1,
          currentThreadId: () => 2,
        }),
      });

      expect(() => foreign.register(listener)).toThrow(
        ConfinementViolationError,
      );
      expect(primary.listeners).toHaveLength(0);
      expect(loggerMock.fatal).toHaveBeenCalledTimes(1);
    });
  });

  it("describes its state", () => {
    fusion.register(listener);

    expect(fusion.toString()).toBe(
      "{registered=true, paused=false, near=null, primarySensor={fake loaded=true paused=false}, secondarySensor={fake loaded=true paused=true} secondarySafe=false}",
    );
  });
});
