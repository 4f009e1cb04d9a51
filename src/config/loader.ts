// Config — the fixed search-path convention plus the few environment settings the
// launcher reads for itself. There is no config file: the layout below is a contract
// with the native build (cargo writes to target/release/), not a user preference.
import path from "node:path";
import { z } from "zod";
import { LOG_LEVELS } from "../types/config.js";
import type { EnvSettings, LauncherConfig } from "../types/config.js";

export const LAUNCHER_CONFIG: LauncherConfig = {
  binaryName: "upd",
  releaseDir: ["target", "release"],
  windowsSuffix: ".exe",
  // src/bin/ and dist/bin/ both sit two levels below the project root.
  rootDepth: 2,
  buildCommand: "cargo build --release",
};

const DEFAULT_ENV_SETTINGS: EnvSettings = { logLevel: "warn" };

const EnvSchema = z.object({
  LOG_LEVEL: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVELS)).optional(),
});

/**
 * Read launcher settings from the environment.
 * Invalid values fall back to defaults: a bad LOG_LEVEL must never stop the
 * native binary from starting.
 */
export function loadEnvSettings(env: NodeJS.ProcessEnv): EnvSettings {
  const parsed = EnvSchema.safeParse({ LOG_LEVEL: env["LOG_LEVEL"] });
  if (!parsed.success) return { ...DEFAULT_ENV_SETTINGS };
  return {
    logLevel: parsed.data.LOG_LEVEL ?? DEFAULT_ENV_SETTINGS.logLevel,
  };
}

/** Walk `depth` directory levels up from the launcher's own directory. */
export function resolveProjectRoot(launcherDir: string, depth: number = LAUNCHER_CONFIG.rootDepth): string {
  return path.resolve(launcherDir, ...Array<string>(depth).fill(".."));
}
