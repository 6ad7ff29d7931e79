import { describe, expect, it } from "vitest";
import { JobRegistry } from "../src/application/job-registry.js";

describe("JobRegistry", () => {
  describe("validateJobs", () => {
    it("accepts well-formed jobs", () => {
      const jobs = new JobRegistry({
        home: { operations: [{ source: "~/docs", destination: "/mnt/backup/docs" }] },
        empty: { operations: [] },
      });
      expect(jobs.validateJobs()).toEqual([]);
    });

    it("reports an operation without a source", () => {
      const jobs = new JobRegistry({ default_backup: { operations: [{}] } });
      expect(jobs.validateJobs()).toEqual([
        "Job 'default_backup' operation 1 missing 'source'",
      ]);
    });

    it("reports structural problems per job and keeps going", () => {
      const jobs = new JobRegistry({
        " ": { operations: [] },
        text: "copy everything",
        bare: {},
        scalar: { operations: 5 },
        later: { operations: [{ source: "/a" }, { destination: "/b" }] },
      });

      expect(jobs.validateJobs()).toEqual([
        "There is a blank job name.",
        "Job 'text' must be a mapping, got string.",
        "Job 'bare' has no operations.",
        "Job 'scalar' operations must be a list, got number.",
        "Job 'later' operation 2 missing 'source'",
      ]);
    });

    it("rejects the name reserved for the check loop", () => {
      const jobs = new JobRegistry({ timer: { operations: [{ source: "/a" }] } });
      expect(jobs.validateJobs()).toEqual(["Job 'timer' uses a reserved name."]);
      expect(jobs.has("timer")).toBe(true);
      expect(jobs.get("timer")).toBeUndefined();
    });

    it("names the field of other operation problems", () => {
      const jobs = new JobRegistry({ home: { operations: [{ source: "" }] } });
      const errors = jobs.validateJobs();
      expect(errors).toHaveLength(1);
      expect(errors[0]).toMatch(/^Job 'home' operation 1 'source' /);
    });

    it("treats a non-mapping jobs section as empty", () => {
      const jobs = new JobRegistry(["home"]);
      expect(jobs.names()).toEqual([]);
      expect(jobs.validateJobs()).toEqual([]);
    });
  });

  describe("lookup", () => {
    const jobs = new JobRegistry({
      home: { operations: [{ source: "/home", destination: "/mnt/home", mode: "mirror" }] },
      broken: { operations: [{}] },
    });

    it("lists every job name in document order", () => {
      expect(jobs.names()).toEqual(["home", "broken"]);
    });

    it("returns valid jobs with their extra keys", () => {
      expect(jobs.get("home")).toEqual({
        operations: [{ source: "/home", destination: "/mnt/home", mode: "mirror" }],
      });
    });

    it("hides invalid and unknown jobs", () => {
      expect(jobs.has("broken")).toBe(true);
      expect(jobs.get("broken")).toBeUndefined();
      expect(jobs.has("missing")).toBe(false);
      expect(jobs.get("missing")).toBeUndefined();
    });
  });
});
