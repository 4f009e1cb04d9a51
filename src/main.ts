// Entry point — the single error boundary of the launcher.
// Resolve, then invoke; every failure on the way ends here as one "Error: <message>"
// line on the error stream and exit code 1. Nothing is retried.
import { locate } from "./resolution/resolver.js";
import { errorMessage } from "./shared/errors.js";
import type { Invoker } from "./execution/invoker.js";
import type { LauncherConfig } from "./types/config.js";
import type { ExitOutcome, LaunchState } from "./types/launch.js";
import { logger } from "./logger.js";

export interface ErrorStream {
  write(chunk: string): unknown;
}

export interface MainOptions {
  /** Arguments after the program name, forwarded untouched. */
  args: readonly string[];
  projectRoot: string;
  platform: NodeJS.Platform;
  invoker: Invoker;
  stderr: ErrorStream;
  config?: LauncherConfig;
}

export function main(options: MainOptions): ExitOutcome {
  let state: LaunchState = "idle";
  const transition = (next: LaunchState): void => {
    logger.debug({ from: state, to: next }, "Launch state changed");
    state = next;
  };
  const fail = (err: unknown): ExitOutcome => {
    transition("failed");
    options.stderr.write(`Error: ${errorMessage(err)}\n`);
    return 1;
  };

  try {
    const resolved = locate({
      projectRoot: options.projectRoot,
      platform: options.platform,
      config: options.config,
    });
    if (!resolved.ok) return fail(resolved.error);
    transition("resolved");

    const outcome = options.invoker.invoke(resolved.location.path, options.args);
    transition("invoked");
    return outcome;
  } catch (err) {
    return fail(err);
  }
}
