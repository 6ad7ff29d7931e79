/**
 * Binds ready timers to job names and runs the jobs.
 */

import { ALL_JOBS } from "../core/types/timer.js";
import type { JobEvent } from "../core/types/job.js";
import type { IExecutionCoordinator } from "../core/interfaces/coordinator.js";
import type { JobRegistry } from "./job-registry.js";
import type { Timer } from "./timer.js";
import logger from "../utils/logger.js";

/**
 * Runs the jobs of one check cycle, either one after another
 * (runSync) or all at once through the coordinator (start / isDone).
 *
 * A job that is unknown, invalid or already running is reported as an
 * error for that name only; its siblings still run.
 */
export class JobsWatcher {
  private jobs: JobRegistry;
  private coordinator: IExecutionCoordinator;
  private timers: Map<string, Timer> = new Map();
  private pending: Set<string> = new Set();
  private _error: string | undefined;
  private _results: Map<string, JobEvent> = new Map();

  constructor(options: { jobs: JobRegistry; coordinator: IExecutionCoordinator }) {
    this.jobs = options.jobs;
    this.coordinator = options.coordinator;
  }

  /**
   * Bind a timer to this cycle.
   */
  addTimer(name: string, timer: Timer): void {
    this.timers.set(name, timer);
  }

  /**
   * Names of the bound timers.
   */
  timerNames(): string[] {
    return Array.from(this.timers.keys());
  }

  /**
   * Job names targeted by the bound timers, deduplicated, in timer then
   * command order. The wildcard expands to every job in the registry.
   */
  jobNames(): string[] {
    const names = new Set<string>();
    for (const timer of this.timers.values()) {
      for (const name of this.expandCommands(timer)) {
        names.add(name);
      }
    }
    return Array.from(names);
  }

  /**
   * Bound timers none of whose jobs was refused or cut short by a stop.
   * Only these should be marked as ran.
   */
  finishedTimerNames(): string[] {
    return this.timerNames().filter((timerName) => {
      const timer = this.timers.get(timerName);
      if (!timer) {
        return false;
      }
      return this.expandCommands(timer).every((jobName) => {
        const result = this._results.get(jobName);
        return result !== undefined && !result.stopped;
      });
    });
  }

  /**
   * First error seen during the run, if any.
   */
  get error(): string | undefined {
    return this._error;
  }

  /**
   * Result record of each job that has finished.
   */
  get results(): Map<string, JobEvent> {
    return new Map(this._results);
  }

  /**
   * Run every job in order, waiting for each before the next.
   */
  async runSync(): Promise<JobEvent> {
    for (const name of this.jobNames()) {
      const job = this.jobs.get(name);
      if (!job) {
        this.record(name, { error: this.missingJobError(name), status: "done" });
        continue;
      }
      logger.info({ job: name }, "Running job");
      this.record(name, await this.coordinator.runJob(name, job));
    }

    const event: JobEvent = { status: "done" };
    if (this._error) {
      event.error = this._error;
    }
    return event;
  }

  /**
   * Start every job concurrently. Poll isDone() for completion.
   */
  start(): void {
    for (const name of this.jobNames()) {
      const job = this.jobs.get(name);
      if (!job) {
        this.record(name, { error: this.missingJobError(name), status: "done" });
        continue;
      }

      this.pending.add(name);
      const event = this.coordinator.startJob(name, job, (result) => {
        this.pending.delete(name);
        this.record(name, result);
      });
      if (event.error) {
        this.pending.delete(name);
        this.record(name, event);
      }
    }
    logger.info({ pending: Array.from(this.pending) }, "Started jobs");
  }

  /**
   * Whether every job started by start() has finished.
   */
  isDone(): boolean {
    return this.pending.size === 0;
  }

  private expandCommands(timer: Timer): string[] {
    return timer.commands.flatMap((command) =>
      command === ALL_JOBS ? this.jobs.names() : [command],
    );
  }

  private missingJobError(name: string): string {
    return this.jobs.has(name)
      ? `Job '${name}' is not valid.`
      : `Job '${name}' does not exist.`;
  }

  private record(name: string, event: JobEvent): void {
    this._results.set(name, event);
    if (event.error) {
      logger.error({ job: name, error: event.error }, "Job reported an error");
      if (this._error === undefined) {
        this._error = event.error;
      }
    } else {
      logger.info({ job: name }, "Job done");
    }
  }
}
