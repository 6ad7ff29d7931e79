/**
 * Process-wide pino logger.
 */

import { pino, type LevelWithSilent } from "pino";

const logger = pino({
  name: "backupwatch",
  level: process.env.LOG_LEVEL || "warn",
});

/**
 * Change the minimum level at runtime (used by --verbose / --debug).
 */
export function setLogLevel(level: LevelWithSilent): void {
  logger.level = level;
}

export default logger;
