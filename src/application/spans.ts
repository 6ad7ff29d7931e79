/**
 * Period boundaries for each timer span. All arithmetic is in UTC.
 */

import { TIMER_SPANS, type TimerSpan } from "../core/types/timer.js";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * How a span divides time into periods.
 */
export interface SpanRule {
  /** Start of the period containing `instant`. */
  periodStart(instant: Date): Date;
  /** Start of the period following the one that starts at `start`. */
  nextPeriodStart(start: Date): Date;
}

function startOfUtcDay(instant: Date): Date {
  return new Date(
    Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), instant.getUTCDate()),
  );
}

/**
 * Weeks start on Monday.
 */
function startOfUtcWeek(instant: Date): Date {
  const day = startOfUtcDay(instant);
  const daysSinceMonday = (day.getUTCDay() + 6) % 7;
  return new Date(day.getTime() - daysSinceMonday * MS_PER_DAY);
}

function startOfUtcMonth(instant: Date): Date {
  return new Date(Date.UTC(instant.getUTCFullYear(), instant.getUTCMonth(), 1));
}

export const SPAN_RULES: Record<TimerSpan, SpanRule> = {
  daily: {
    periodStart: startOfUtcDay,
    nextPeriodStart: (start) => new Date(start.getTime() + MS_PER_DAY),
  },
  weekly: {
    periodStart: startOfUtcWeek,
    nextPeriodStart: (start) => new Date(start.getTime() + 7 * MS_PER_DAY),
  },
  monthly: {
    periodStart: startOfUtcMonth,
    nextPeriodStart: (start) =>
      new Date(Date.UTC(start.getUTCFullYear(), start.getUTCMonth() + 1, 1)),
  },
};

export function isTimerSpan(value: unknown): value is TimerSpan {
  return TIMER_SPANS.some((span) => span === value);
}
