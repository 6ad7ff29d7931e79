import { describe, expect, it } from "vitest";
import {
  Timer,
  formatUtcInstant,
  parseTimeOfDay,
  parseUtcInstant,
} from "../src/application/timer.js";

const at = (iso: string) => new Date(iso);

function daily(time: string, ran?: string, enabled = true): Timer {
  return new Timer({
    timeOfDay: time,
    span: "daily",
    commands: ["*"],
    enabled,
    ran: ran ? at(ran) : undefined,
  });
}

describe("parseTimeOfDay", () => {
  it("parses hours, minutes and optional seconds", () => {
    expect(parseTimeOfDay("12:00")).toBe(43_200_000);
    expect(parseTimeOfDay("07:30:15")).toBe(27_015_000);
    expect(parseTimeOfDay("00:00")).toBe(0);
  });

  it("rejects malformed times", () => {
    expect(parseTimeOfDay("24:00")).toBeNull();
    expect(parseTimeOfDay("9:00")).toBeNull();
    expect(parseTimeOfDay("noon")).toBeNull();
  });
});

describe("parseUtcInstant / formatUtcInstant", () => {
  it("reads zone-less timestamps as UTC", () => {
    expect(parseUtcInstant("2024-01-01 12:05:00")?.toISOString()).toBe(
      "2024-01-01T12:05:00.000Z",
    );
    expect(parseUtcInstant("2024-01-01T12:05:00")?.toISOString()).toBe(
      "2024-01-01T12:05:00.000Z",
    );
  });

  it("honours explicit offsets", () => {
    expect(parseUtcInstant("2024-01-01T14:05:00+02:00")?.toISOString()).toBe(
      "2024-01-01T12:05:00.000Z",
    );
  });

  it("returns null for garbage", () => {
    expect(parseUtcInstant("not a date")).toBeNull();
  });

  it("formats with second precision", () => {
    expect(formatUtcInstant(at("2024-01-01T12:05:00.789Z"))).toBe("2024-01-01T12:05:00Z");
  });
});

describe("Timer", () => {
  it("rejects an invalid time of day", () => {
    expect(() => daily("25:00")).toThrow(RangeError);
  });

  describe("fromDict", () => {
    it("builds a timer with defaults", () => {
      const result = Timer.fromDict({ time: "12:00", span: "daily" });
      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.commands).toEqual([]);
      expect(result.value.enabled).toBe(true);
      expect(result.value.ran).toBeUndefined();
    });

    it("reports an unknown span", () => {
      const result = Timer.fromDict({ time: "12:00", span: "hourly", commands: ["*"] });
      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toHaveLength(1);
      expect(result.error[0]).toMatch(/^'span' /);
    });

    it("reports a missing time", () => {
      const result = Timer.fromDict({ span: "daily", commands: [] });
      expect(result).toEqual({ ok: false, error: ["missing 'time'"] });
    });

    it("reports an unreadable ran timestamp", () => {
      const result = Timer.fromDict({
        time: "12:00",
        span: "daily",
        commands: [],
        ran: "not a date",
      });
      expect(result).toEqual({
        ok: false,
        error: ["'ran' is not a valid timestamp: 'not a date'"],
      });
    });

    it("round-trips through toDict", () => {
      const timer = daily("06:30", "2024-03-04T06:31:07Z");
      timer.commands = ["home", "photos"];
      expect(timer.toDict()).toEqual({
        time: "06:30",
        span: "daily",
        commands: ["home", "photos"],
        enabled: true,
        ran: "2024-03-04T06:31:07Z",
      });

      const again = Timer.fromDict(timer.toDict());
      expect(again.ok).toBe(true);
      if (!again.ok) return;
      expect(again.value.toDict()).toEqual(timer.toDict());
      expect(again.value.ran?.getTime()).toBe(timer.ran?.getTime());
    });
  });

  describe("daily readiness", () => {
    it("is ready after the time of day when it never ran", () => {
      expect(daily("12:00").isReady(at("2024-01-01T13:00:00Z"))).toBe(true);
      expect(daily("12:00").isReady(at("2024-01-01T12:00:00Z"))).toBe(true);
    });

    it("is not ready before the time of day", () => {
      expect(daily("12:00").isReady(at("2024-01-01T11:59:59Z"))).toBe(false);
    });

    it("is not ready again in the same day after running", () => {
      const timer = daily("12:00", "2024-01-01T12:05:00Z");
      expect(timer.isReady(at("2024-01-01T18:00:00Z"))).toBe(false);
    });

    it("re-arms in the next day once the time passes", () => {
      const timer = daily("12:00", "2024-01-01T12:05:00Z");
      expect(timer.isReady(at("2024-01-02T11:00:00Z"))).toBe(false);
      expect(timer.isReady(at("2024-01-02T12:00:00Z"))).toBe(true);
    });

    it("counts a run before today's boundary as today's run", () => {
      const timer = daily("12:00", "2024-01-01T10:00:00Z");
      expect(timer.ranInPeriod(at("2024-01-01T13:00:00Z"))).toBe(true);
      expect(timer.isReady(at("2024-01-01T13:00:00Z"))).toBe(false);
      expect(timer.isReady(at("2024-01-02T12:00:00Z"))).toBe(true);
    });

    it("treats a run late on the previous day as an earlier period", () => {
      const timer = daily("12:00", "2023-12-31T23:59:59Z");
      expect(timer.isReady(at("2024-01-01T12:00:00Z"))).toBe(true);
    });

    it("is never ready when disabled", () => {
      const timer = daily("00:00", undefined, false);
      expect(timer.isReady(at("2024-01-01T13:00:00Z"))).toBe(false);
      expect(timer.nextDue(at("2024-01-01T13:00:00Z"))).toBeNull();
    });

    it("does not change ran when checked", () => {
      const timer = daily("12:00");
      timer.isReady(at("2024-01-01T13:00:00Z"));
      expect(timer.ran).toBeUndefined();
    });
  });

  describe("weekly and monthly spans", () => {
    const weekly = (ran?: string) =>
      new Timer({
        timeOfDay: "09:00",
        span: "weekly",
        commands: [],
        enabled: true,
        ran: ran ? at(ran) : undefined,
      });

    it("anchors weeks on Monday", () => {
      // 2024-01-01 is a Monday
      expect(weekly().utcDateTime(at("2024-01-03T10:00:00Z")).toISOString()).toBe(
        "2024-01-01T09:00:00.000Z",
      );
      expect(weekly().utcDateTime(at("2024-01-07T23:00:00Z")).toISOString()).toBe(
        "2024-01-01T09:00:00.000Z",
      );
    });

    it("stays fired for the rest of the week", () => {
      const timer = weekly("2024-01-01T09:30:00Z");
      expect(timer.isReady(at("2024-01-07T23:00:00Z"))).toBe(false);
      expect(timer.isReady(at("2024-01-08T08:00:00Z"))).toBe(false);
      expect(timer.isReady(at("2024-01-08T09:00:00Z"))).toBe(true);
    });

    it("anchors months on the first day", () => {
      const timer = new Timer({
        timeOfDay: "06:00",
        span: "monthly",
        commands: [],
        enabled: true,
        ran: at("2024-02-01T06:00:00Z"),
      });
      expect(timer.utcDateTime(at("2024-02-15T00:00:00Z")).toISOString()).toBe(
        "2024-02-01T06:00:00.000Z",
      );
      expect(timer.isReady(at("2024-02-29T23:00:00Z"))).toBe(false);
      expect(timer.nextDue(at("2024-02-15T00:00:00Z"))?.toISOString()).toBe(
        "2024-03-01T06:00:00.000Z",
      );
    });
  });

  describe("nextDue", () => {
    it("is the boundary when it has not passed yet", () => {
      expect(daily("12:00").nextDue(at("2024-01-01T10:00:00Z"))?.toISOString()).toBe(
        "2024-01-01T12:00:00.000Z",
      );
    });

    it("is now when the timer is ready", () => {
      const now = at("2024-01-01T13:00:00Z");
      expect(daily("12:00").nextDue(now)).toBe(now);
    });

    it("skips today's boundary when it already ran earlier today", () => {
      const timer = daily("12:00", "2024-01-01T09:00:00Z");
      expect(timer.nextDue(at("2024-01-01T10:00:00Z"))?.toISOString()).toBe(
        "2024-01-02T12:00:00.000Z",
      );
    });

    it("is the next period's boundary after running", () => {
      const timer = daily("12:00", "2024-01-01T12:05:00Z");
      expect(timer.nextDue(at("2024-01-01T18:00:00Z"))?.toISOString()).toBe(
        "2024-01-02T12:00:00.000Z",
      );
    });
  });
});
