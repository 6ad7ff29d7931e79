/**
 * Backup backend interface.
 */

import type { BackupContext, Job, JobEvent } from "../types/job.js";

/**
 * Performs the actual backup for a job.
 */
export interface IBackupBackend {
  /**
   * Run every operation of a job. Rejections are reported by the
   * coordinator as the job's error.
   */
  run(jobName: string, job: Job, context: BackupContext): Promise<JobEvent>;
}
