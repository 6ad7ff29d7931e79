/**
 * Zod schemas for runtime configuration and the settings document.
 */

import { z } from "zod";
import { TIMER_SPANS } from "../../core/types/timer.js";

/** "HH:MM" or "HH:MM:SS" on a 24-hour clock. */
export const TIME_OF_DAY_PATTERN = /^([01]\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;

/**
 * One backup operation. Unknown keys are kept for the backend.
 */
export const OperationSchema = z
  .object({
    source: z.string().min(1),
    destination: z.string().min(1).optional(),
  })
  .passthrough();

export const JobSchema = z
  .object({
    operations: z.array(OperationSchema),
  })
  .passthrough();

/**
 * Timer as persisted under taskmanager.timers.
 */
export const TimerDictSchema = z.object({
  time: z.string().regex(TIME_OF_DAY_PATTERN, "must be HH:MM or HH:MM:SS"),
  span: z.enum(TIMER_SPANS),
  commands: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  ran: z.string().nullable().optional(),
});

export const StopConfigSchema = z.object({
  /** Ceiling for the wait between polls */
  maxWaitMs: z.number().int().positive().default(20_000),
  initialBackoffMs: z.number().int().positive().default(1_000),
  backoffIncrementMs: z.number().int().nonnegative().default(2_000),
});

/**
 * Runtime options (CLI flags, environment), separate from the
 * persisted settings document.
 */
export const ConfigSchema = z.object({
  settingsPath: z.string().min(1).optional(),
  threaded: z.boolean().default(false),
  /** How often threaded mode checks whether all jobs finished */
  pollIntervalMs: z.number().int().positive().default(1_000),
  /** Delay between periodic checks in watch mode */
  checkIntervalMs: z.number().int().positive().default(60_000),
  stop: StopConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Render a zod issue as a short message naming the offending field.
 */
export function describeIssue(issue: z.ZodIssue): string {
  const field = issue.path.join(".");
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return `missing '${field}'`;
  }
  return field ? `'${field}' ${issue.message}` : issue.message;
}
