/**
 * Backup job types.
 */

/**
 * Execution name of the periodic check loop. No job may use it.
 */
export const CHECK_LOOP_NAME = "timer";

/**
 * A single unit of work within a job.
 *
 * Only `source` is required by the scheduler; the remaining keys belong
 * to the backend that performs the backup.
 */
export interface Operation {
  source: string;
  destination?: string;
  [key: string]: unknown;
}

/**
 * A named, user-defined sequence of operations.
 */
export interface Job {
  operations: Operation[];
}

/**
 * Result record delivered when an execution finishes, or returned
 * immediately when it could not be started.
 */
export interface JobEvent {
  status?: "done";
  error?: string;
  /** Set when a stop prevented the job from starting or finishing */
  stopped?: boolean;
}

/**
 * Receives the single result record of an execution.
 */
export type ProgressCallback = (event: JobEvent) => void;

/**
 * What a running job can see of its coordinator.
 */
export interface BackupContext {
  /** False once a stop was requested; start no new operations then. */
  shouldContinue(): boolean;
}
