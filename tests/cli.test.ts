import { describe, expect, it } from "vitest";
import { createProgram, formatTimerSummary } from "../src/cli/commands.js";

describe("formatTimerSummary", () => {
  it("shows a ready timer with its period boundary", () => {
    expect(
      formatTimerSummary({
        name: "nightly",
        valid: true,
        enabled: true,
        ready: true,
        time: "12:00",
        span: "daily",
        commands: ["home", "photos"],
        boundary: "2024-01-01T12:00:00Z",
        nextDue: "2024-01-01T13:00:00Z",
      }),
    ).toBe(
      [
        "nightly: READY",
        "  time (UTC): 12:00 daily",
        "  commands: home, photos",
        "  ran (UTC): never",
        "  this period (UTC): 2024-01-01T12:00:00Z",
        "  next due (UTC): 2024-01-01T13:00:00Z",
      ].join("\n"),
    );
  });

  it("marks disabled timers and omits the next run", () => {
    const text = formatTimerSummary({
      name: "weekly",
      valid: true,
      enabled: false,
      ready: false,
      time: "09:00",
      span: "weekly",
      commands: ["*"],
      ran: "2024-01-01T09:30:00Z",
      boundary: "2024-01-01T09:00:00Z",
    });
    expect(text.split("\n")).toEqual([
      "weekly: (disabled)",
      "  time (UTC): 09:00 weekly",
      "  commands: *",
      "  ran (UTC): 2024-01-01T09:30:00Z",
      "  this period (UTC): 2024-01-01T09:00:00Z",
    ]);
  });

  it("points invalid timers at validate", () => {
    expect(
      formatTimerSummary({ name: "broken", valid: false, enabled: false, ready: false, commands: [] }),
    ).toBe("broken: invalid (see 'validate')");
  });
});

describe("createProgram", () => {
  it("registers every command", () => {
    expect(createProgram().commands.map((command) => command.name())).toEqual([
      "check",
      "timers",
      "validate",
      "watch",
    ]);
  });
});
