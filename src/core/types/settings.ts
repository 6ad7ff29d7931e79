/**
 * Settings document types.
 */

/**
 * The nested key-value document persisted by the settings store.
 */
export type SettingsDocument = Record<string, unknown>;

/**
 * Accumulated, non-fatal problems found while loading.
 */
export interface LoadResults {
  errors: string[];
}
