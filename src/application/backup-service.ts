/**
 * Top-level backup check cycle.
 */

import { setTimeout as sleep } from "timers/promises";
import type { ISettingsStore } from "../core/interfaces/settings-store.js";
import type { IBackupBackend } from "../core/interfaces/backup-backend.js";
import type { StopOptions } from "../core/interfaces/coordinator.js";
import { CHECK_LOOP_NAME, type JobEvent } from "../core/types/job.js";
import type { LoadResults } from "../core/types/settings.js";
import type { TimerDict } from "../core/types/timer.js";
import { err, ok, type Result } from "../core/types/result.js";
import { loadConfig, resolveSettingsPath, type Config } from "../infrastructure/config/index.js";
import { isRecord, typeName } from "../utils/objects.js";
import { ExecutionCoordinator } from "./coordinator.js";
import { JobRegistry } from "./job-registry.js";
import { JobsWatcher } from "./jobs-watcher.js";
import { TaskManager } from "./task-manager.js";
import { formatUtcInstant, type Timer } from "./timer.js";
import logger from "../utils/logger.js";

/**
 * Options for one check cycle.
 */
export interface CycleOptions {
  /** Instant to check against; defaults to the current time */
  now?: Date;
  /** Only consider the ready timer with this name */
  timerName?: string;
  /** Override config.threaded */
  threaded?: boolean;
}

/**
 * Outcome of one check cycle.
 */
export interface CycleResult {
  /** Ready timers that were dispatched */
  ready: string[];
  /** Jobs those timers resolved to */
  jobNames: string[];
  /** First error reported by any job */
  error?: string;
  /** Ready timers left unmarked because a stop interrupted their jobs */
  interrupted?: string[];
}

/**
 * One row of the timer overview.
 */
export interface TimerSummary {
  name: string;
  valid: boolean;
  enabled: boolean;
  ready: boolean;
  time?: string;
  span?: string;
  commands: string[];
  ran?: string;
  /** Boundary in the period containing `now` */
  boundary?: string;
  nextDue?: string;
}

/**
 * Backend for backupwatch: loads settings, decides which timers are
 * ready, runs their jobs and persists the run markers.
 *
 * The settings store is passed in and owned by the caller; nothing here
 * touches process-wide state.
 */
export class BackupService {
  static readonly DEFAULT_BACKUP_NAME = "default_backup";
  /** Execution name reserved for the periodic check loop. */
  static readonly TIMER_JOB_NAME = CHECK_LOOP_NAME;

  readonly settings: ISettingsStore;
  readonly coordinator: ExecutionCoordinator;
  readonly config: Config;

  tm: TaskManager | null = null;
  jobs: JobRegistry = new JobRegistry({});
  errors: string[] = [];
  error: string | undefined;
  busy = false;

  private onError: ((error: string) => void) | null;
  private timerAbort: AbortController | null = null;

  constructor(options: {
    settings: ISettingsStore;
    backend: IBackupBackend;
    config?: Config;
    onError?: (error: string) => void;
  }) {
    this.settings = options.settings;
    this.config = options.config ?? loadConfig();
    this.coordinator = new ExecutionCoordinator({ backend: options.backend });
    this.onError = options.onError ?? null;
  }

  /**
   * Timer dict seeded when the settings have no task manager.
   */
  static defaultTimerDict(): TimerDict {
    return {
      time: "12:00",
      span: "daily",
      commands: ["*"],
      enabled: true,
    };
  }

  /**
   * Load settings, heal their structure, validate jobs and load timers.
   *
   * Problems that do not prevent running are returned, not thrown.
   */
  start(): LoadResults {
    const results: LoadResults = { errors: [] };

    const { path, found } = resolveSettingsPath(this.config.settingsPath);
    if (found) {
      this.settings.load(path);
      logger.warn({ path }, "Using settings file");
    } else {
      this.settings.path = path;
      logger.warn({ path }, "Defaulting to (new) settings file");
    }

    if (!this.settings.has("jobs")) {
      logger.warn({ path }, "No 'jobs' found in settings");
      this.settings.set("jobs", {});
    }

    let addDefault = false;
    if (this.settings.has("taskmanager")) {
      const raw = this.settings.get("taskmanager");
      if (!isRecord(raw)) {
        logger.error({ type: typeName(raw), value: raw }, "Healing non-mapping taskmanager");
        this.settings.delete("taskmanager");
      }
    }
    if (!this.settings.has("taskmanager")) {
      addDefault = true;
      this.settings.set("taskmanager", { timers: {} });
    }
    if (addDefault) {
      logger.warn({ name: BackupService.DEFAULT_BACKUP_NAME }, "Adding default timer");
      this.addTimerDict(BackupService.DEFAULT_BACKUP_NAME, BackupService.defaultTimerDict());
    }

    this.jobs = new JobRegistry(this.settings.get("jobs"));
    results.errors.push(...this.jobs.validateJobs());

    const deserialized = this.deserializeTimers(results);
    if (!deserialized.ok) {
      // Healing above guarantees a mapping; reaching this is a bug.
      throw new TypeError(deserialized.error);
    }
    this.tm = deserialized.value;
    logger.info({ timers: this.tm.toDict() }, "Loaded timers");

    this.errors.push(...results.errors);
    return results;
  }

  /**
   * Build the timer registry from the settings. Timer-level problems
   * are appended to `results`.
   */
  deserializeTimers(results: LoadResults): Result<TaskManager, string> {
    const raw = this.settings.get("taskmanager");
    if (!isRecord(raw)) {
      return err(`Expected mapping for taskmanager, got ${typeName(raw)}`);
    }
    const tm = new TaskManager();
    logger.debug("Deserializing timers");
    results.errors.push(...tm.fromDict(raw).errors);
    return ok(tm);
  }

  /**
   * Write the timer registry back into the settings document.
   */
  serializeTimers(): void {
    const tm = this.requireTaskManager();
    const existing = this.settings.get("taskmanager");
    this.settings.set("taskmanager", {
      ...(isRecord(existing) ? existing : {}),
      ...tm.toDict(),
    });
  }

  save(): void {
    this.serializeTimers();
    this.settings.save();
  }

  /**
   * Ready timers at `now`, optionally restricted to one timer name.
   */
  getReadyTimers(now: Date = new Date(), timerName?: string): Map<string, Timer> {
    const ready = this.requireTaskManager().getReadyTimers(now);
    if (!timerName) {
      return ready;
    }

    const matching = new Map<string, Timer>();
    for (const [name, timer] of ready) {
      if (name === timerName) {
        matching.set(name, timer);
        logger.info({ name }, "Adding timer");
      } else {
        logger.warn({ name, only: timerName }, "Skipped ready timer");
      }
    }
    return matching;
  }

  /**
   * One check: run the jobs of every ready timer, mark those timers as
   * ran at `now` and save. A timer whose jobs a stop refused or cut
   * short is not marked. Nothing is saved when no timer is ready.
   */
  async runCycle(options: CycleOptions = {}): Promise<CycleResult> {
    const tm = this.requireTaskManager();
    const now = options.now ?? new Date();
    const threaded = options.threaded ?? this.config.threaded;

    logger.info({ now: formatUtcInstant(now) }, "Checking timers");
    const timers = this.getReadyTimers(now, options.timerName);
    if (timers.size === 0) {
      logger.info("No timers are ready");
      return { ready: [], jobNames: [] };
    }

    const watcher = new JobsWatcher({ jobs: this.jobs, coordinator: this.coordinator });
    for (const [name, timer] of timers) {
      logger.info({ name, timer: timer.toDict() }, "Timer ready");
      watcher.addTimer(name, timer);
    }
    const jobNames = watcher.jobNames();

    let error: string | undefined;
    if (threaded) {
      watcher.start();
      logger.info({ jobNames }, "Waiting for jobs to complete");
      while (!watcher.isDone()) {
        await sleep(this.config.pollIntervalMs);
      }
      error = watcher.error;
    } else {
      logger.info({ jobNames }, "Running jobs");
      const event: JobEvent = await watcher.runSync();
      error = event.error;
    }

    const finished = new Set(watcher.finishedTimerNames());
    const interrupted: string[] = [];
    for (const name of timers.keys()) {
      if (finished.has(name)) {
        tm.markRan(name, now);
      } else {
        interrupted.push(name);
      }
    }
    if (interrupted.length > 0) {
      logger.warn({ timers: interrupted }, "Stopped before all jobs ran; timers stay ready");
    }
    this.save();
    logger.info({ path: this.settings.path }, "Saved settings");

    const result: CycleResult = { ready: Array.from(timers.keys()), jobNames };
    if (interrupted.length > 0) {
      result.interrupted = interrupted;
    }
    if (error !== undefined) {
      result.error = error;
      this.showError(error);
    }
    return result;
  }

  /**
   * Periodic check entry point. Does nothing while a check is running.
   */
  async onTimer(): Promise<void> {
    if (this.busy) {
      logger.warn("onTimer: busy");
      return;
    }
    logger.debug("onTimer: running check");
    this.busy = true;
    this.error = undefined;
    try {
      await this.runCycle();
    } catch (error) {
      this.showError(error instanceof Error ? error.message : String(error));
    } finally {
      this.busy = false;
    }
  }

  /**
   * Run periodic checks in the background until stopSync is called.
   */
  runTimer(): JobEvent {
    const abort = new AbortController();
    const event = this.coordinator.spawn(
      BackupService.TIMER_JOB_NAME,
      () => this.runTimerLoop(abort.signal),
      (result) => {
        logger.info({ result }, "Periodic check loop ended");
      },
    );
    if (!event.error) {
      this.timerAbort = abort;
    }
    return event;
  }

  /**
   * Stop the periodic loop, start no more work and wait for running jobs.
   */
  async stopSync(options?: StopOptions): Promise<boolean> {
    this.timerAbort?.abort();
    this.timerAbort = null;
    return this.coordinator.stopSync(options ?? this.config.stop);
  }

  /**
   * Overview of every timer, including invalid and non-ready ones.
   */
  describeTimers(now: Date = new Date()): TimerSummary[] {
    const tm = this.requireTaskManager();
    const rows: TimerSummary[] = [];
    for (const [name, timer] of tm.entries()) {
      const nextDue = timer.nextDue(now);
      rows.push({
        name,
        valid: true,
        enabled: timer.enabled,
        ready: timer.isReady(now),
        time: timer.timeOfDay,
        span: timer.span,
        commands: [...timer.commands],
        ran: timer.ran ? formatUtcInstant(timer.ran) : undefined,
        boundary: formatUtcInstant(timer.utcDateTime(now)),
        nextDue: nextDue ? formatUtcInstant(nextDue) : undefined,
      });
    }
    for (const name of tm.rejectedNames) {
      rows.push({ name, valid: false, enabled: false, ready: false, commands: [] });
    }
    return rows;
  }

  private async runTimerLoop(signal: AbortSignal): Promise<JobEvent> {
    while (this.coordinator.runLevel > 0 && !signal.aborted) {
      await this.onTimer();
      try {
        await sleep(this.config.checkIntervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) {
          throw error;
        }
      }
    }
    return {};
  }

  private addTimerDict(name: string, timerDict: TimerDict): void {
    const taskmanager = this.settings.get("taskmanager");
    const tmDict = isRecord(taskmanager) ? taskmanager : {};
    const timers = isRecord(tmDict.timers) ? tmDict.timers : {};
    timers[name] = timerDict;
    tmDict.timers = timers;
    this.settings.set("taskmanager", tmDict);
  }

  private showError(error: string): void {
    this.error = error;
    this.onError?.(error);
  }

  private requireTaskManager(): TaskManager {
    if (!this.tm) {
      throw new Error("BackupService.start() must be called before checking timers");
    }
    return this.tm;
  }
}
