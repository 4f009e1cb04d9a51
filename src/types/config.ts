/** Layout contract with the build that produces the native binary. */
export interface LauncherConfig {
  readonly binaryName: string;
  readonly releaseDir: readonly string[];
  readonly windowsSuffix: string;
  /** Directory levels between the launcher's own directory and the project root. */
  readonly rootDepth: number;
  readonly buildCommand: string;
}

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** Settings the launcher itself reads from its environment. */
export interface EnvSettings {
  readonly logLevel: LogLevel;
}
