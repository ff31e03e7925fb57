/**
 * Event System Exports
 */

export {
  TypedSchedulerEmitter,
  type SchedulerEventMap,
  type SchedulerEventName,
  type SchedulerEventHandler,
  type SchedulerState,
} from "./scheduler-events.js";
