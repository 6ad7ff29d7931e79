/**
 * Storage infrastructure exports.
 */

export { JsonSettingsStore } from "./settings-store.js";
