#!/usr/bin/env node
/**
 * backupwatch - run backup jobs when their timers are due.
 */

import { createProgram } from "./cli/commands.js";
import logger from "./utils/logger.js";

const program = createProgram();
program.parseAsync().catch((error: unknown) => {
  logger.fatal({ error }, "backupwatch failed");
  process.exitCode = 1;
});
