/**
 * Filesystem path helpers.
 */

import { existsSync, mkdirSync } from "fs";
import { homedir } from "os";
import { join } from "path";

/** Directory created under the platform data root. */
export const APP_DIR_NAME = "backupwatch";

/**
 * Logical roots understood by getSysdirSub.
 */
export type SysdirRoot = "LOCALAPPDATA" | "APPDATA" | "HOME";

/**
 * Expand a leading ~ to the user's home directory.
 */
export function expandUser(path: string): string {
  if (path === "~") {
    return homedir();
  }
  if (path.startsWith("~/") || path.startsWith("~\\")) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

/**
 * Ensure a directory exists, creating parents as needed.
 */
export function ensureDir(path: string): string {
  if (!existsSync(path)) {
    mkdirSync(path, { recursive: true });
  }
  return path;
}

/**
 * Resolve the platform directory standing in for a Windows-style root.
 */
export function getSysdir(
  root: SysdirRoot,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  const home = homedir();

  if (root === "HOME") {
    return home;
  }

  if (platform === "win32") {
    const fromEnv = env[root];
    if (fromEnv) {
      return fromEnv;
    }
    return root === "LOCALAPPDATA"
      ? join(home, "AppData", "Local")
      : join(home, "AppData", "Roaming");
  }

  if (platform === "darwin") {
    return join(home, "Library", "Application Support");
  }

  // XDG has no roaming/local split
  return env.XDG_DATA_HOME || join(home, ".local", "share");
}

/**
 * Path to a file in this application's directory under a system root,
 * e.g. getSysdirSub("LOCALAPPDATA", "settings.json").
 */
export function getSysdirSub(
  root: SysdirRoot,
  name: string,
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return join(getSysdir(root, platform, env), APP_DIR_NAME, name);
}
