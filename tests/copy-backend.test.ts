import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CopyBackend } from "../src/infrastructure/backup/index.js";

const proceed = { shouldContinue: () => true };

describe("CopyBackend", () => {
  let dir: string;
  const backend = new CopyBackend();

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "backupwatch-copy-"));
    mkdirSync(join(dir, "docs"));
    writeFileSync(join(dir, "docs", "notes.txt"), "hello", "utf-8");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("copies directories recursively", async () => {
    const event = await backend.run(
      "docs",
      { operations: [{ source: join(dir, "docs"), destination: join(dir, "backup", "docs") }] },
      proceed,
    );

    expect(event).toEqual({});
    expect(readFileSync(join(dir, "backup", "docs", "notes.txt"), "utf-8")).toBe("hello");
  });

  it("reports the first failure and runs the remaining operations", async () => {
    const missing = join(dir, "missing");
    const event = await backend.run(
      "docs",
      {
        operations: [
          { source: join(dir, "docs") },
          { source: missing, destination: join(dir, "out") },
          { source: join(dir, "docs", "notes.txt"), destination: join(dir, "copy.txt") },
        ],
      },
      proceed,
    );

    expect(event).toEqual({ error: "Job 'docs' operation 1 missing 'destination'" });
    expect(readFileSync(join(dir, "copy.txt"), "utf-8")).toBe("hello");
  });

  it("names a missing source", async () => {
    const missing = join(dir, "missing");
    const event = await backend.run(
      "docs",
      { operations: [{ source: missing, destination: join(dir, "out") }] },
      proceed,
    );
    expect(event).toEqual({
      error: `Job 'docs' operation 1 source does not exist: ${missing}`,
    });
  });

  it("starts no operation once a stop is requested", async () => {
    const event = await backend.run(
      "docs",
      { operations: [{ source: join(dir, "docs"), destination: join(dir, "out") }] },
      { shouldContinue: () => false },
    );
    expect(event).toEqual({ error: "Job 'docs' stopped before operation 1", stopped: true });
  });
});
