/**
 * Runtime config loading and settings file discovery.
 */

import { existsSync } from "fs";
import { hostname } from "os";
import { ConfigSchema, type Config, type ConfigInput } from "./schema.js";
import { getSysdirSub } from "../../utils/paths.js";

const ENV_PREFIX = "BACKUPWATCH_";

function envBool(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const v = String(env[ENV_PREFIX + key] || "").trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(v)) return true;
  if (["0", "false", "no", "off"].includes(v)) return false;
  return undefined;
}

function envInt(env: NodeJS.ProcessEnv, key: string): number | undefined {
  const raw = String(env[ENV_PREFIX + key] || "").trim();
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isInteger(n) ? n : undefined;
}

function envStr(env: NodeJS.ProcessEnv, key: string): string | undefined {
  return String(env[ENV_PREFIX + key] || "").trim() || undefined;
}

/**
 * Overlay BACKUPWATCH_* environment variables onto a config input.
 */
export function applyEnvOverrides(
  input: ConfigInput,
  env: NodeJS.ProcessEnv = process.env,
): ConfigInput {
  return mergeConfig(input, {
    settingsPath: envStr(env, "SETTINGS"),
    threaded: envBool(env, "THREADED"),
    pollIntervalMs: envInt(env, "POLL_INTERVAL_MS"),
    checkIntervalMs: envInt(env, "CHECK_INTERVAL_MS"),
    stop: {
      maxWaitMs: envInt(env, "STOP_MAX_WAIT_MS"),
      initialBackoffMs: envInt(env, "STOP_INITIAL_BACKOFF_MS"),
      backoffIncrementMs: envInt(env, "STOP_BACKOFF_INCREMENT_MS"),
    },
  });
}

/**
 * Merge two config inputs; defined values in `higher` win.
 */
function mergeConfig(lower: ConfigInput, higher: ConfigInput): ConfigInput {
  return {
    settingsPath: higher.settingsPath ?? lower.settingsPath,
    threaded: higher.threaded ?? lower.threaded,
    pollIntervalMs: higher.pollIntervalMs ?? lower.pollIntervalMs,
    checkIntervalMs: higher.checkIntervalMs ?? lower.checkIntervalMs,
    stop: {
      maxWaitMs: higher.stop?.maxWaitMs ?? lower.stop?.maxWaitMs,
      initialBackoffMs: higher.stop?.initialBackoffMs ?? lower.stop?.initialBackoffMs,
      backoffIncrementMs: higher.stop?.backoffIncrementMs ?? lower.stop?.backoffIncrementMs,
    },
  };
}

/**
 * Build the runtime config: defaults, then environment, then overrides.
 */
export function loadConfig(
  overrides: ConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): Config {
  return ConfigSchema.parse(mergeConfig(applyEnvOverrides({}, env), overrides));
}

/**
 * Settings file used when no other candidate exists.
 */
export function getDefaultSettingsPath(): string {
  return getSysdirSub("LOCALAPPDATA", "settings.json");
}

/**
 * Settings files tried in order: host-specific, local, then default.
 */
export function getSettingsCandidates(host: string = hostname()): string[] {
  return [
    `backupwatch-${host}.json`,
    "backupwatch.json",
    getDefaultSettingsPath(),
  ];
}

/**
 * Pick the settings file to load.
 *
 * An explicit path always wins. Otherwise the first existing candidate
 * is used; `found` is false when none exists yet.
 */
export function resolveSettingsPath(
  explicit?: string,
  candidates: string[] = getSettingsCandidates(),
  exists: (path: string) => boolean = existsSync,
): { path: string; found: boolean } {
  if (explicit) {
    return { path: explicit, found: exists(explicit) };
  }
  for (const candidate of candidates) {
    if (exists(candidate)) {
      return { path: candidate, found: true };
    }
  }
  return { path: getDefaultSettingsPath(), found: false };
}
