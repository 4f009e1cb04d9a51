// Resolver — computes where the native binary should be and checks that it is there.
// Read-only: the only side effects are stat calls and debug logs. Not-found is a
// value (ResolveResult), any other filesystem error is thrown to the entry point.
import fs from "node:fs";
import path from "node:path";
import { LAUNCHER_CONFIG } from "../config/loader.js";
import { LauncherError, LauncherErrorCode, errnoCode } from "../shared/errors.js";
import type { LauncherConfig } from "../types/config.js";
import type { ResolveResult } from "../types/launch.js";
import { logger } from "../logger.js";

export interface LocateOptions {
  projectRoot: string;
  platform: NodeJS.Platform;
  config?: LauncherConfig;
}

/**
 * Candidate locations in lookup order. The bare name is always tried first;
 * Windows additionally gets the `.exe` variant.
 */
export function searchPaths(
  projectRoot: string,
  platform: NodeJS.Platform,
  config: LauncherConfig = LAUNCHER_CONFIG,
): string[] {
  const base = path.resolve(projectRoot, ...config.releaseDir, config.binaryName);
  return platform === "win32" ? [base, `${base}${config.windowsSuffix}`] : [base];
}

function isUsableEntry(candidate: string): boolean {
  try {
    return !fs.statSync(candidate).isDirectory();
  } catch (err) {
    const code = errnoCode(err);
    // ENOTDIR: some parent component (e.g. target/) is a plain file; ELOOP: symlink cycle
    if (code === "ENOENT" || code === "ENOTDIR" || code === "ELOOP") return false;
    throw err;
  }
}

export function locate(options: LocateOptions): ResolveResult {
  const config = options.config ?? LAUNCHER_CONFIG;
  const candidates = searchPaths(options.projectRoot, options.platform, config);

  for (const candidate of candidates) {
    if (isUsableEntry(candidate)) {
      logger.debug({ candidate }, "Native binary found");
      return { ok: true, location: { path: candidate } };
    }
    logger.debug({ candidate }, "No usable native binary at candidate");
  }

  return {
    ok: false,
    error: new LauncherError(
      LauncherErrorCode.BINARY_NOT_FOUND,
      `Could not find the native ${config.binaryName} binary. ` +
        `Please ensure it was built with '${config.buildCommand}'.`,
      { searched: candidates },
    ),
  };
}
