/**
 * Timer types for recurring backup checks.
 */

/**
 * Recurrence granularities a timer can use.
 */
export const TIMER_SPANS = ["daily", "weekly", "monthly"] as const;

export type TimerSpan = (typeof TIMER_SPANS)[number];

/** Command entry that expands to every known job. */
export const ALL_JOBS = "*";

/**
 * In-memory timer fields.
 */
export interface TimerData {
  /** "HH:MM" or "HH:MM:SS", always UTC */
  timeOfDay: string;
  span: TimerSpan;
  /** Job names (or ALL_JOBS) triggered when ready */
  commands: string[];
  enabled: boolean;
  /** Last instant the timer was marked as fired */
  ran?: Date;
}

/**
 * Timer as stored in the settings document.
 */
export interface TimerDict {
  time: string;
  span: string;
  commands: string[];
  enabled: boolean;
  ran?: string;
}

/**
 * The "taskmanager" section of the settings document.
 */
export interface TaskManagerDict {
  timers: Record<string, unknown>;
}
