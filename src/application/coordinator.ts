/**
 * Registry of in-flight executions with per-name deduplication.
 */

import { setTimeout as sleep } from "timers/promises";
import type { Job, JobEvent, ProgressCallback } from "../core/types/job.js";
import type { IBackupBackend } from "../core/interfaces/backup-backend.js";
import type {
  ExecutionWork,
  IExecutionCoordinator,
  StopOptions,
} from "../core/interfaces/coordinator.js";
import logger from "../utils/logger.js";

const DEFAULT_MAX_WAIT_MS = 20_000;
const DEFAULT_INITIAL_BACKOFF_MS = 1_000;
const DEFAULT_BACKOFF_INCREMENT_MS = 2_000;

/**
 * Handle to one background execution.
 */
interface Execution {
  alive: boolean;
}

/**
 * Runs named executions in the background, at most one per name.
 *
 * Each execution removes its own registry entry when it settles. Any
 * entry still found with a dead handle is an orphan and is discarded on
 * the next lookup or stop poll. All registry access happens in
 * synchronous code, so registration, liveness checks and removal never
 * interleave.
 */
export class ExecutionCoordinator implements IExecutionCoordinator {
  private backend: IBackupBackend;
  private executions: Map<string, Execution> = new Map();
  private _runLevel = 1;

  constructor(options: { backend: IBackupBackend }) {
    this.backend = options.backend;
  }

  get runLevel(): number {
    return this._runLevel;
  }

  /**
   * Start a backup job in the background.
   *
   * Returns `{}` when started, or a done event with an error when an
   * execution with the same name is still live or a stop was requested.
   */
  startJob(name: string, job: Job, progressCb: ProgressCallback): JobEvent {
    return this.spawn(
      name,
      () => this.backend.run(name, job, { shouldContinue: () => this._runLevel > 0 }),
      progressCb,
    );
  }

  /**
   * Start arbitrary work in the background under `name`.
   *
   * `progressCb` receives exactly one event, with status "done", once
   * the work settles.
   */
  spawn(name: string, work: ExecutionWork, progressCb: ProgressCallback): JobEvent {
    if (typeof progressCb !== "function") {
      throw new TypeError("Set the progressCb to a function.");
    }

    if (this._runLevel <= 0) {
      logger.warn({ name }, "Not starting execution while stopping");
      return {
        error: `${name} not started: stopping.`,
        status: "done",
        stopped: true,
      };
    }

    if (this.liveExecution(name)) {
      return {
        error: `${name} is already running.`,
        status: "done",
      };
    }

    const execution: Execution = { alive: true };
    this.executions.set(name, execution);
    void this.execute(name, execution, work, progressCb);

    logger.debug({ name }, "Started execution");
    return {};
  }

  /**
   * Start a job and resolve with its result record.
   */
  runJob(name: string, job: Job): Promise<JobEvent> {
    return new Promise((resolve) => {
      const event = this.startJob(name, job, resolve);
      if (event.error) {
        resolve(event);
      }
    });
  }

  isRunning(name: string): boolean {
    return this.liveExecution(name) !== undefined;
  }

  /**
   * Names with a live execution.
   */
  runningNames(): string[] {
    return Array.from(this.executions.entries())
      .filter(([, execution]) => execution.alive)
      .map(([name]) => name);
  }

  /**
   * Refuse new work and wait until every execution has finished.
   *
   * Polls with a growing backoff capped at `maxWaitMs`. Never abandons
   * live executions, so this resolves only once the registry is empty.
   */
  async stopSync(options: StopOptions = {}): Promise<boolean> {
    const maxWaitMs = options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS;
    const backoffIncrementMs = options.backoffIncrementMs ?? DEFAULT_BACKOFF_INCREMENT_MS;
    let waitMs = Math.min(options.initialBackoffMs ?? DEFAULT_INITIAL_BACKOFF_MS, maxWaitMs);

    this._runLevel = 0;

    while (this.executions.size > 0) {
      const aliveNames: string[] = [];
      for (const [name, execution] of this.executions) {
        if (!execution.alive) {
          logger.warn({ name }, "stopSync is removing orphaned execution");
          this.executions.delete(name);
        } else {
          aliveNames.push(name);
        }
      }

      if (this.executions.size > 0) {
        logger.warn({ waitMs, names: aliveNames }, "Waiting for executions to finish");
        await sleep(waitMs);
        waitMs = Math.min(waitMs + backoffIncrementMs, maxWaitMs);
      }
    }

    return true;
  }

  /**
   * Allow new work again after a stop.
   */
  resume(): void {
    this._runLevel = 1;
  }

  /**
   * The live execution registered under `name`, discarding a dead one.
   */
  private liveExecution(name: string): Execution | undefined {
    const execution = this.executions.get(name);
    if (!execution) {
      return undefined;
    }
    if (!execution.alive) {
      logger.warn({ name }, "Discarding orphaned execution");
      this.executions.delete(name);
      return undefined;
    }
    return execution;
  }

  /**
   * Run the work, unregister it, then report. Never rejects.
   */
  private async execute(
    name: string,
    execution: Execution,
    work: ExecutionWork,
    progressCb: ProgressCallback,
  ): Promise<void> {
    let event: JobEvent;
    try {
      event = { ...(await work()) };
    } catch (error) {
      logger.error({ error, name }, "Execution failed");
      event = { error: error instanceof Error ? error.message : String(error) };
    } finally {
      execution.alive = false;
      if (this.executions.get(name) === execution) {
        this.executions.delete(name);
      }
    }
    event.status = "done";

    try {
      progressCb(event);
    } catch (error) {
      logger.error({ error, name }, "Progress callback failed");
    }
  }
}
