/**
 * Command-line interface.
 */

import { Command } from "commander";
import { BackupService, type TimerSummary } from "../application/backup-service.js";
import { CopyBackend } from "../infrastructure/backup/index.js";
import { getDefaultSettingsPath, loadConfig } from "../infrastructure/config/index.js";
import { JsonSettingsStore } from "../infrastructure/storage/index.js";
import logger, { setLogLevel } from "../utils/logger.js";

const VERSION = "0.1.0";

interface GlobalOptions {
  settings?: string;
  verbose?: boolean;
  debug?: boolean;
}

interface CheckOptions {
  backupName?: string;
  threaded?: boolean;
}

/**
 * Create a service with the bundled copy backend and load its settings.
 */
function startService(globals: GlobalOptions, threaded?: boolean): BackupService {
  const config = loadConfig({ settingsPath: globals.settings, threaded });
  const service = new BackupService({
    settings: new JsonSettingsStore(),
    backend: new CopyBackend(),
    config,
  });

  const results = service.start();
  if (results.errors.length > 0) {
    logger.error({ errors: results.errors }, "Start errors");
  }
  return service;
}

/**
 * Format one timer for the `timers` listing.
 */
export function formatTimerSummary(row: TimerSummary): string {
  if (!row.valid) {
    return `${row.name}: invalid (see 'validate')`;
  }
  const lines = [
    `${row.name}:${row.ready ? " READY" : ""}${row.enabled ? "" : " (disabled)"}`,
    `  time (UTC): ${row.time} ${row.span}`,
    `  commands: ${row.commands.join(", ")}`,
    `  ran (UTC): ${row.ran ?? "never"}`,
    `  this period (UTC): ${row.boundary}`,
  ];
  if (row.nextDue) {
    lines.push(`  next due (UTC): ${row.nextDue}`);
  }
  return lines.join("\n");
}

/**
 * Run one check cycle. Job errors are logged; they do not change the
 * exit code.
 */
async function runCheck(globals: GlobalOptions, options: CheckOptions): Promise<void> {
  const service = startService(globals, options.threaded ? true : undefined);
  const result = await service.runCycle({ timerName: options.backupName });

  if (result.error) {
    logger.error({ error: result.error, jobs: result.jobNames }, "Check finished with errors");
  } else if (result.ready.length > 0) {
    logger.info({ jobs: result.jobNames }, "Check finished");
  }
}

/**
 * Run periodic checks until interrupted.
 */
async function runWatch(globals: GlobalOptions): Promise<number> {
  const service = startService(globals);
  const event = service.runTimer();
  if (event.error) {
    logger.error({ error: event.error }, "Could not start periodic checks");
    return 1;
  }

  await new Promise<void>((resolve) => {
    const shutdown = (signal: NodeJS.Signals): void => {
      logger.warn({ signal }, "Stopping");
      service
        .stopSync()
        .catch((error: unknown) => logger.error({ error }, "Stop failed"))
        .finally(resolve);
    };
    process.once("SIGINT", shutdown);
    process.once("SIGTERM", shutdown);
  });
  return 0;
}

/**
 * Create the CLI program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("backupwatch")
    .description(
      "Run backup jobs whose timers are due. Invoke frequently so scheduled timers get checked.",
    )
    .version(VERSION)
    .option("-s, --settings <path>", `Settings file (default: search, then ${getDefaultSettingsPath()})`)
    .option("-v, --verbose", "Enable verbose output")
    .option("-V, --debug", "Enable verbose info and debug output")
    .hook("preAction", (thisCommand) => {
      const globals = thisCommand.opts<GlobalOptions>();
      if (globals.debug) {
        setLogLevel("debug");
      } else if (globals.verbose) {
        setLogLevel("info");
      }
    });

  program
    .command("check", { isDefault: true })
    .description("Run the jobs of every timer that is ready now")
    .option("-n, --backup-name <name>", "Only run the ready timer with this name")
    .option("-t, --threaded", "Run jobs concurrently")
    .action(async (options: CheckOptions) => {
      await runCheck(program.opts<GlobalOptions>(), options);
    });

  program
    .command("timers")
    .description("List timers, including ones that are not ready")
    .action(() => {
      const service = startService(program.opts<GlobalOptions>());
      const rows = service.describeTimers();
      if (rows.length === 0) {
        console.log("No timers");
        return;
      }
      for (const row of rows) {
        console.log(formatTimerSummary(row));
      }
    });

  program
    .command("validate")
    .description("Check jobs and timers in the settings file")
    .action(() => {
      const service = startService(program.opts<GlobalOptions>());
      if (service.errors.length === 0) {
        console.log(`${service.settings.path}: OK`);
        return;
      }
      for (const error of service.errors) {
        console.log(`- ${error}`);
      }
      process.exitCode = 1;
    });

  program
    .command("watch")
    .description("Keep running and check timers periodically until interrupted")
    .action(async () => {
      process.exitCode = await runWatch(program.opts<GlobalOptions>());
    });

  return program;
}
