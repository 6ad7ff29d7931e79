/**
 * Execution coordinator interface.
 */

import type { Job, JobEvent, ProgressCallback } from "../types/job.js";

/**
 * Backoff settings for a cooperative stop.
 */
export interface StopOptions {
  maxWaitMs?: number;
  initialBackoffMs?: number;
  backoffIncrementMs?: number;
}

/**
 * Work started under a name; resolves to its result record.
 */
export type ExecutionWork = () => Promise<JobEvent>;

/**
 * Interface for the in-flight execution registry.
 */
export interface IExecutionCoordinator {
  /**
   * Positive while new work may start.
   */
  readonly runLevel: number;

  /**
   * Start a job in the background unless one with the same name is live
   * or a stop was requested.
   */
  startJob(name: string, job: Job, progressCb: ProgressCallback): JobEvent;

  /**
   * Start arbitrary work in the background under a name.
   */
  spawn(name: string, work: ExecutionWork, progressCb: ProgressCallback): JobEvent;

  /**
   * Start a job and wait for its result record.
   */
  runJob(name: string, job: Job): Promise<JobEvent>;

  /**
   * Whether a live execution is registered under the name.
   */
  isRunning(name: string): boolean;

  /**
   * Request a stop and wait until no executions remain.
   */
  stopSync(options?: StopOptions): Promise<boolean>;
}
