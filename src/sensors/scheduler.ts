type TimeoutHandle = ReturnType<typeof setTimeout>;

/** Cancels a scheduled task. Cancelling twice, or after the task ran, does nothing. */
export interface CancelHandle {
  cancel(): void;
  isActive(): boolean;
}

export type ScheduleOptions = {
  /**
   * Background tasks (the default) do not keep the process alive. Pass
   * `false` when a caller is waiting on the task's result.
   */
  unref?: boolean;
};

export interface DelayableScheduler {
  /** Runs `task` on the owner's context after at least `delayMs`. */
  scheduleAfterDelay(
    delayMs: number,
    task: () => void,
    options?: ScheduleOptions,
  ): CancelHandle;
  cancel(handle: CancelHandle): void;
}

const unrefIfPossible = (handle: TimeoutHandle): void => {
  if (typeof handle === "object" && typeof handle.unref === "function") {
    handle.unref();
  }
};

class TimerCancelHandle implements CancelHandle {
  private timer: TimeoutHandle | null;

  constructor(timer: TimeoutHandle) {
    this.timer = timer;
  }

  markFired(): void {
    this.timer = null;
  }

  cancel(): void {
    if (this.timer === null) {
      return;
    }
    clearTimeout(this.timer);
    this.timer = null;
  }

  isActive(): boolean {
    return this.timer !== null;
  }
}

/**
 * Schedules on the Node.js event loop. Timers are unref'd unless the caller
 * asks otherwise, so a pending background task never keeps the process
 * alive on its own.
 */
export class TimerScheduler implements DelayableScheduler {
  scheduleAfterDelay(
    delayMs: number,
    task: () => void,
    options: ScheduleOptions = {},
  ): CancelHandle {
    let handle: TimerCancelHandle | null = null;
    const timer = setTimeout(
      () => {
        handle?.markFired();
        task();
      },
      Math.max(0, delayMs),
    );
    if (options.unref ?? true) {
      unrefIfPossible(timer);
    }
    handle = new TimerCancelHandle(timer);
    return handle;
  }

  cancel(handle: CancelHandle): void {
    handle.cancel();
  }
}
