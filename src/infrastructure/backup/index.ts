/**
 * Backup backend exports.
 */

export { CopyBackend } from "./copy-backend.js";
