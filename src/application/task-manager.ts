/**
 * Timer registry and readiness computation.
 */

import type { TaskManagerDict } from "../core/types/timer.js";
import type { LoadResults } from "../core/types/settings.js";
import { isRecord, typeName } from "../utils/objects.js";
import { Timer } from "./timer.js";
import logger from "../utils/logger.js";

/**
 * Owns the mapping of timer name to Timer.
 *
 * Persisted timers that fail validation are reported by fromDict and
 * kept verbatim, so saving never drops a timer the user wrote.
 */
export class TaskManager {
  private timers: Map<string, Timer> = new Map();
  private rejected: Map<string, unknown> = new Map();

  /**
   * Names of valid timers in registry order.
   */
  get names(): string[] {
    return Array.from(this.timers.keys());
  }

  /**
   * Names of persisted timers that failed validation.
   */
  get rejectedNames(): string[] {
    return Array.from(this.rejected.keys());
  }

  get size(): number {
    return this.timers.size;
  }

  getTimer(name: string): Timer | undefined {
    return this.timers.get(name);
  }

  /**
   * Add or replace a timer.
   */
  setTimer(name: string, timer: Timer): void {
    this.rejected.delete(name);
    this.timers.set(name, timer);
  }

  /**
   * Remove a timer (valid or rejected) by name.
   */
  removeTimer(name: string): boolean {
    const removed = this.timers.delete(name);
    return this.rejected.delete(name) || removed;
  }

  /**
   * Iterate over valid timers in registry order.
   */
  entries(): IterableIterator<[string, Timer]> {
    return this.timers.entries();
  }

  /**
   * Timers that are ready at `now`, in registry order.
   */
  getReadyTimers(now: Date = new Date()): Map<string, Timer> {
    const ready = new Map<string, Timer>();
    for (const [name, timer] of this.timers) {
      if (timer.isReady(now)) {
        ready.set(name, timer);
      }
    }
    return ready;
  }

  /**
   * Record that a timer fired at `instant`.
   */
  markRan(name: string, instant: Date = new Date()): boolean {
    if (Number.isNaN(instant.getTime())) {
      throw new RangeError(`Invalid instant for timer '${name}'`);
    }
    const timer = this.timers.get(name);
    if (!timer) {
      logger.warn({ name }, "markRan: no such timer");
      return false;
    }
    timer.ran = instant;
    return true;
  }

  toDict(): TaskManagerDict {
    const timers: Record<string, unknown> = {};
    for (const [name, timer] of this.timers) {
      timers[name] = timer.toDict();
    }
    for (const [name, raw] of this.rejected) {
      timers[name] = raw;
    }
    return { timers };
  }

  /**
   * Replace the registry with the timers in a "taskmanager" value.
   * Never throws; problems are returned as messages.
   */
  fromDict(dict: unknown): LoadResults {
    const results: LoadResults = { errors: [] };
    this.timers.clear();
    this.rejected.clear();

    if (!isRecord(dict)) {
      logger.warn({ type: typeName(dict) }, "taskmanager is not a mapping; no timers loaded");
      return results;
    }

    const timers = dict.timers;
    if (timers === undefined) {
      return results;
    }
    if (!isRecord(timers)) {
      results.errors.push(
        `'timers' must be a mapping, got ${typeName(timers)}; no timers loaded`,
      );
      return results;
    }

    for (const [name, raw] of Object.entries(timers)) {
      const parsed = Timer.fromDict(raw);
      if (parsed.ok) {
        this.timers.set(name, parsed.value);
        logger.debug({ name }, "Deserialized timer");
        continue;
      }
      this.rejected.set(name, raw);
      for (const error of parsed.error) {
        results.errors.push(`Timer '${name}' ${error}`);
      }
    }

    return results;
  }
}
