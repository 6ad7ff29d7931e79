/**
 * Backend that copies each operation's source to its destination.
 */

import { cp } from "fs/promises";
import { existsSync } from "fs";
import type { IBackupBackend } from "../../core/interfaces/backup-backend.js";
import type { BackupContext, Job, JobEvent } from "../../core/types/job.js";
import { expandUser } from "../../utils/paths.js";
import logger from "../../utils/logger.js";

/**
 * Copy backend.
 *
 * Operations run in order. A failing operation is reported and the
 * rest still run; once a stop is requested no further operation starts.
 */
export class CopyBackend implements IBackupBackend {
  async run(jobName: string, job: Job, context: BackupContext): Promise<JobEvent> {
    const event: JobEvent = {};
    const fail = (message: string): void => {
      logger.error({ job: jobName, error: message }, "Operation failed");
      if (event.error === undefined) {
        event.error = message;
      }
    };

    for (const [index, operation] of job.operations.entries()) {
      const position = index + 1;
      if (!context.shouldContinue()) {
        fail(`Job '${jobName}' stopped before operation ${position}`);
        event.stopped = true;
        break;
      }
      if (!operation.destination) {
        fail(`Job '${jobName}' operation ${position} missing 'destination'`);
        continue;
      }

      const source = expandUser(operation.source);
      const destination = expandUser(operation.destination);
      if (!existsSync(source)) {
        fail(`Job '${jobName}' operation ${position} source does not exist: ${source}`);
        continue;
      }

      logger.info({ job: jobName, operation: position, source, destination }, "Copying");
      try {
        await cp(source, destination, { recursive: true, force: true });
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        fail(`Job '${jobName}' operation ${position} failed: ${reason}`);
      }
    }

    return event;
  }
}
