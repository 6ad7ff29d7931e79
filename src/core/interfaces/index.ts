/**
 * Core interface exports.
 */

export * from "./settings-store.js";
export * from "./backup-backend.js";
export * from "./coordinator.js";
