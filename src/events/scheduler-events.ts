/**
 * Scheduler Events
 *
 * Type-safe event emitter for the refresh lifecycle. The service manager
 * subscribes to persist state for `status`; tests subscribe to observe
 * attempts without reaching into the scheduler.
 */

import { EventEmitter } from "node:events";
import type { RefreshFailure, RefreshResult, RefreshSummary } from "../types/index.js";
import { createLogger } from "../shared/logger.js";

const logger = createLogger("SchedulerEvents");

export type SchedulerState = "idle" | "refreshing" | "backoff" | "stopped";

export interface SchedulerEventMap {
  /** One attempt finished, successful or not */
  "refresh:completed": {
    summary: RefreshSummary;
    result: RefreshResult;
    consecutiveFailures: number;
    nextRunAt: string | null;
  };

  /** The timer was re-armed, cleared, or the state changed */
  "schedule:updated": { state: SchedulerState; nextRunAt: string | null };

  /** Consecutive failures reached the alert threshold */
  "alert:raised": { consecutiveFailures: number; lastError: RefreshFailure | null; message: string };
}

export type SchedulerEventName = keyof SchedulerEventMap;

export type SchedulerEventHandler<K extends SchedulerEventName> = (
  payload: SchedulerEventMap[K]
) => void;

/**
 * EventEmitter with typed emit/subscribe helpers. Handler errors are logged
 * and never reach the emitter.
 */
export class TypedSchedulerEmitter extends EventEmitter {
  emitEvent<K extends SchedulerEventName>(event: K, payload: SchedulerEventMap[K]): boolean {
    logger.debug("Event emitted", { event });
    return this.emit(event, payload);
  }

  onEvent<K extends SchedulerEventName>(event: K, handler: SchedulerEventHandler<K>): this {
    return this.on(event, guard(event, handler));
  }
}

function guard<K extends SchedulerEventName>(
  event: K,
  handler: SchedulerEventHandler<K>
): SchedulerEventHandler<K> {
  return (payload) => {
    try {
      handler(payload);
    } catch (error) {
      logger.error("Event handler failed", error, { event, handler: handler.name || "anonymous" });
    }
  };
}
