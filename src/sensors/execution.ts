import { threadId } from "node:worker_threads";
import { getLogger } from "../shared/logger";
import { captureException } from "../shared/monitoring/sentry";
import { ConfinementViolationError } from "./errors";

const logger = getLogger("execution", "runtime");

/** The confinement context that every sensor operation must run on. */
export interface Execution {
  /** Throws when called off the confinement context. */
  assertIsMainThread(): void;
}

type ConfinedExecutionOptions = {
  /** Thread the context is bound to. Defaults to the constructing thread. */
  ownerThreadId?: number;
  /** Reads the id of the calling thread. */
  currentThreadId?: () => number;
};

/**
 * Binds to one Node.js thread (the main thread or a single worker). Objects
 * holding a ConfinedExecution may only be touched from that thread.
 */
export class ConfinedExecution implements Execution {
  private readonly ownerThreadId: number;

  private readonly currentThreadId: () => number;

  constructor(options: ConfinedExecutionOptions = {}) {
    this.currentThreadId = options.currentThreadId ?? (() => threadId);
    this.ownerThreadId = options.ownerThreadId ?? this.currentThreadId();
  }

  getOwnerThreadId(): number {
    return this.ownerThreadId;
  }

  assertIsMainThread(): void {
    const actual = this.currentThreadId();
    if (actual === this.ownerThreadId) {
      return;
    }

    const error = new ConfinementViolationError(this.ownerThreadId, actual);
    logger.fatal(error.message, {
      expectedThreadId: this.ownerThreadId,
      actualThreadId: actual,
      stack: error.stack,
    });
    captureException(error);
    throw error;
  }
}
