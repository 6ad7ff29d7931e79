/**
 * Infrastructure module - external dependencies and implementations.
 */

export * from "./storage/index.js";
export * from "./backup/index.js";
export * from "./config/index.js";
