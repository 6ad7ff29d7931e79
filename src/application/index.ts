/**
 * Application module - scheduling logic.
 */

export {
  BackupService,
  type CycleOptions,
  type CycleResult,
  type TimerSummary,
} from "./backup-service.js";
export { ExecutionCoordinator } from "./coordinator.js";
export { JobRegistry } from "./job-registry.js";
export { JobsWatcher } from "./jobs-watcher.js";
export { TaskManager } from "./task-manager.js";
export { Timer, parseTimeOfDay, parseUtcInstant, formatUtcInstant } from "./timer.js";
export { SPAN_RULES, isTimerSpan, type SpanRule } from "./spans.js";
