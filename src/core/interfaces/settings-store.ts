/**
 * Settings store interface.
 */

import type { SettingsDocument } from "../types/settings.js";

/**
 * Interface for the persisted settings document.
 */
export interface ISettingsStore {
  /**
   * File the document was loaded from and will be saved to.
   */
  path: string | null;

  /**
   * Load the document, replacing the in-memory copy.
   * Records `path` when given.
   */
  load(path?: string): void;

  /**
   * Write the in-memory document to `path`.
   */
  save(): void;

  get(key: string): unknown;

  set(key: string, value: unknown): void;

  has(key: string): boolean;

  delete(key: string): boolean;

  /**
   * A shallow copy of the whole document.
   */
  toJSON(): SettingsDocument;
}
