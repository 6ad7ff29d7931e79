/**
 * JSON file settings store.
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import { dirname } from "path";
import type { ISettingsStore } from "../../core/interfaces/settings-store.js";
import type { SettingsDocument } from "../../core/types/settings.js";
import { ensureDir } from "../../utils/paths.js";
import { isRecord } from "../../utils/objects.js";
import logger from "../../utils/logger.js";

/**
 * Settings document kept in memory and persisted as pretty-printed JSON.
 */
export class JsonSettingsStore implements ISettingsStore {
  path: string | null;
  private data: SettingsDocument = {};

  constructor(path: string | null = null) {
    this.path = path;
  }

  /**
   * Load the document from `path` (or the current path).
   *
   * A missing file yields an empty document. Anything other than a
   * JSON object is an error naming the file.
   */
  load(path?: string): void {
    if (path) {
      this.path = path;
    }
    if (!this.path) {
      throw new Error("No settings path to load from");
    }

    if (!existsSync(this.path)) {
      logger.debug({ path: this.path }, "Settings file does not exist yet");
      this.data = {};
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Failed to read settings from ${this.path}: ${reason}`);
    }
    if (!isRecord(parsed)) {
      throw new Error(`Settings in ${this.path} must be a JSON object`);
    }
    this.data = parsed;
  }

  save(): void {
    if (!this.path) {
      throw new Error("No settings path to save to");
    }
    ensureDir(dirname(this.path));
    writeFileSync(this.path, JSON.stringify(this.data, null, 2) + "\n", "utf-8");
    logger.debug({ path: this.path }, "Saved settings");
  }

  get(key: string): unknown {
    return this.data[key];
  }

  set(key: string, value: unknown): void {
    this.data[key] = value;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.data, key);
  }

  delete(key: string): boolean {
    if (!this.has(key)) {
      return false;
    }
    delete this.data[key];
    return true;
  }

  toJSON(): SettingsDocument {
    return { ...this.data };
  }
}
