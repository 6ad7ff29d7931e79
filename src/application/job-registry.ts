/**
 * Job definitions and their validation.
 */

import { CHECK_LOOP_NAME, type Job } from "../core/types/job.js";
import { JobSchema, OperationSchema, describeIssue } from "../infrastructure/config/schema.js";
import { isRecord, typeName } from "../utils/objects.js";

/**
 * Registry of job name to job definition, backed by the "jobs" section
 * of the settings document.
 */
export class JobRegistry {
  private jobs: Record<string, unknown>;

  constructor(jobs: unknown) {
    this.jobs = isRecord(jobs) ? jobs : {};
  }

  /**
   * All job names in document order, valid or not.
   */
  names(): string[] {
    return Object.keys(this.jobs);
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.jobs, name);
  }

  /**
   * The job definition, or undefined if it is unknown, invalid or uses
   * the reserved check loop name.
   */
  get(name: string): Job | undefined {
    if (!this.has(name) || name === CHECK_LOOP_NAME) {
      return undefined;
    }
    const parsed = JobSchema.safeParse(this.jobs[name]);
    return parsed.success ? parsed.data : undefined;
  }

  /**
   * Check every job. Never throws; returns one message per problem.
   */
  validateJobs(): string[] {
    const errors: string[] = [];

    for (const [name, job] of Object.entries(this.jobs)) {
      if (!name.trim()) {
        errors.push("There is a blank job name.");
      }
      if (name === CHECK_LOOP_NAME) {
        errors.push(`Job '${name}' uses a reserved name.`);
      }
      if (!isRecord(job)) {
        errors.push(`Job '${name}' must be a mapping, got ${typeName(job)}.`);
        continue;
      }
      if (!("operations" in job)) {
        errors.push(`Job '${name}' has no operations.`);
        continue;
      }
      if (!Array.isArray(job.operations)) {
        errors.push(`Job '${name}' operations must be a list, got ${typeName(job.operations)}.`);
        continue;
      }

      job.operations.forEach((operation: unknown, index: number) => {
        const parsed = OperationSchema.safeParse(operation);
        if (parsed.success) {
          return;
        }
        for (const issue of parsed.error.issues) {
          errors.push(`Job '${name}' operation ${index + 1} ${describeIssue(issue)}`);
        }
      });
    }

    return errors;
  }
}
