export * from "./proximity";

export {
  createThresholdSensorEvent,
  type ThresholdSensor,
  type ThresholdSensorEvent,
  type ThresholdSensorListener,
} from "./types";

export {
  HysteresisThresholdSensor,
  createAbsentThresholdSensor,
  DEFAULT_SAMPLING_DELAY,
  type HysteresisThresholdSensorOptions,
  type SampleHandler,
  type SensorSample,
  type SensorSampleSource,
} from "./threshold-sensor";

export {
  TimerScheduler,
  type CancelHandle,
  type DelayableScheduler,
  type ScheduleOptions,
} from "./scheduler";

export { ConfinedExecution, type Execution } from "./execution";
export { ConfinementViolationError } from "./errors";

export {
  DEFAULT_PROXIMITY_CONFIG,
  getProximityConfig,
  type ProximityConfig,
  type ProximityConfigOverrides,
} from "./config/proximity-config";
