/**
 * A named recurrence rule and its last-run marker.
 */

import type { TimerData, TimerDict, TimerSpan } from "../core/types/timer.js";
import { err, ok, type Result } from "../core/types/result.js";
import {
  TIME_OF_DAY_PATTERN,
  TimerDictSchema,
  describeIssue,
} from "../infrastructure/config/schema.js";
import { SPAN_RULES, isTimerSpan } from "./spans.js";

const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Milliseconds after midnight for "HH:MM[:SS]", or null if malformed.
 */
export function parseTimeOfDay(text: string): number | null {
  const match = TIME_OF_DAY_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] ? Number(match[3]) : 0;
  return ((hours * 60 + minutes) * 60 + seconds) * 1000;
}

/**
 * Parse a persisted timestamp. A value without a zone designator is UTC.
 */
export function parseUtcInstant(text: string): Date | null {
  let normalized = text.trim().replace(" ", "T");
  if (!ZONE_SUFFIX.test(normalized)) {
    normalized += "Z";
  }
  const date = new Date(normalized);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Format an instant as "YYYY-MM-DDTHH:MM:SSZ".
 */
export function formatUtcInstant(instant: Date): string {
  return instant.toISOString().replace(/\.\d{3}Z$/, "Z");
}

/**
 * Timer entity.
 *
 * A timer becomes ready once its time of day has passed in the current
 * period of its span, unless it already ran at any point in that period.
 */
export class Timer implements TimerData {
  readonly timeOfDay: string;
  readonly span: TimerSpan;
  commands: string[];
  enabled: boolean;
  ran?: Date;

  private readonly offsetMs: number;

  constructor(data: TimerData) {
    const offsetMs = parseTimeOfDay(data.timeOfDay);
    if (offsetMs === null) {
      throw new RangeError(`Invalid time of day '${data.timeOfDay}'`);
    }
    if (!isTimerSpan(data.span)) {
      throw new RangeError(`Unknown span '${String(data.span)}'`);
    }
    if (data.ran && Number.isNaN(data.ran.getTime())) {
      throw new RangeError("Invalid ran date");
    }

    this.timeOfDay = data.timeOfDay;
    this.span = data.span;
    this.commands = [...data.commands];
    this.enabled = data.enabled;
    this.ran = data.ran;
    this.offsetMs = offsetMs;
  }

  /**
   * Build a timer from its settings form, collecting every problem.
   */
  static fromDict(dict: unknown): Result<Timer, string[]> {
    const parsed = TimerDictSchema.safeParse(dict);
    if (!parsed.success) {
      return err(parsed.error.issues.map(describeIssue));
    }

    const { time, span, commands, enabled, ran } = parsed.data;
    let ranDate: Date | undefined;
    if (ran) {
      const instant = parseUtcInstant(ran);
      if (!instant) {
        return err([`'ran' is not a valid timestamp: '${ran}'`]);
      }
      ranDate = instant;
    }

    return ok(new Timer({ timeOfDay: time, span, commands, enabled, ran: ranDate }));
  }

  toDict(): TimerDict {
    const dict: TimerDict = {
      time: this.timeOfDay,
      span: this.span,
      commands: [...this.commands],
      enabled: this.enabled,
    };
    if (this.ran) {
      dict.ran = formatUtcInstant(this.ran);
    }
    return dict;
  }

  /**
   * The instant this timer becomes due in the period containing `whatDay`.
   */
  utcDateTime(whatDay: Date = new Date()): Date {
    const start = SPAN_RULES[this.span].periodStart(whatDay);
    return new Date(start.getTime() + this.offsetMs);
  }

  /**
   * Whether the timer already fired in the period containing `now`.
   */
  ranInPeriod(now: Date): boolean {
    if (!this.ran) {
      return false;
    }
    return this.ran.getTime() >= SPAN_RULES[this.span].periodStart(now).getTime();
  }

  /**
   * Readiness predicate. Does not modify the timer.
   */
  isReady(now: Date): boolean {
    if (!this.enabled) {
      return false;
    }
    const boundary = this.utcDateTime(now);
    if (now.getTime() < boundary.getTime()) {
      return false;
    }
    return !this.ranInPeriod(now);
  }

  /**
   * Next instant at or after `now` when the timer is ready, or null
   * for a disabled timer.
   */
  nextDue(now: Date = new Date()): Date | null {
    if (!this.enabled) {
      return null;
    }
    if (this.isReady(now)) {
      return now;
    }
    const boundary = this.utcDateTime(now);
    if (now.getTime() < boundary.getTime() && !this.ranInPeriod(now)) {
      return boundary;
    }
    const rule = SPAN_RULES[this.span];
    const nextStart = rule.nextPeriodStart(rule.periodStart(now));
    return new Date(nextStart.getTime() + this.offsetMs);
  }
}
