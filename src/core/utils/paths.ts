/**
 * User-level paths for layerflow.
 *
 * Locations follow platform conventions through env-paths:
 *
 * - Linux: `~/.config/layerflow`, `~/.local/state/layerflow`
 * - macOS: `~/Library/Preferences/layerflow`, `~/Library/Logs/layerflow`
 * - Windows: `%APPDATA%\layerflow\Config`, `%LOCALAPPDATA%\layerflow\Log`
 *
 * Every other module gets these paths from here and never builds them
 * itself.
 *
 * @module
 */

import * as path from "node:path";
import * as fs from "node:fs";
import envPaths from "env-paths";
import { WorkflowError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface AppPaths {
  /** Folder holding the user configuration file */
  readonly configDir: string;

  /** `<configDir>/config.yaml`, read when no project config is found */
  readonly configFile: string;

  readonly logDir: string;

  /** `<logDir>/layerflow.log`, the default structured log file */
  readonly logFile: string;
}

// =============================================================================
// Internal State
// =============================================================================

let cachedPaths: AppPaths | null = null;

function resolveAppPaths(): AppPaths {
  // suffix: "" prevents env-paths from appending "-nodejs"
  const resolved = envPaths("layerflow", { suffix: "" });
  const configDir = path.normalize(resolved.config);
  const logDir = path.normalize(resolved.log);

  return Object.freeze({
    configDir,
    configFile: path.join(configDir, "config.yaml"),
    logDir,
    logFile: path.join(logDir, "layerflow.log"),
  });
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Resolves the application paths without touching the filesystem.
 */
export function getAppPaths(): AppPaths {
  cachedPaths ??= resolveAppPaths();
  return cachedPaths;
}

/**
 * `mkdir -p`. Permission problems surface as FS_PERMISSION_DENIED, any
 * other failure (usually a file where a folder should be) as FS_NOT_FOUND.
 */
export function ensureDirectory(dirPath: string): void {
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    const systemCode = cause && "code" in cause ? cause.code : undefined;
    const denied = systemCode === "EACCES" || systemCode === "EPERM";

    throw new WorkflowError(
      denied ? "Permission denied while creating directory" : "Failed to create directory",
      denied ? ErrorCode.FS_PERMISSION_DENIED : ErrorCode.FS_NOT_FOUND,
      { path: dirPath, systemCode },
      undefined,
      denied
        ? "Pick a writable location, e.g. with --log-file."
        : `${dirPath} or one of its parents exists and is not a folder.`,
      cause,
    );
  }
}

/**
 * Clears the cached paths so tests can change XDG variables.
 *
 * @internal
 */
export function _resetAppPathsCache(): void {
  cachedPaths = null;
}
