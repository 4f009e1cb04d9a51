// Invocation layer — the boundary where the launcher hands control to the native binary.
// Two strategies share the Invoker interface; selectInvoker() picks one from a static
// property of the runtime (does it expose execve?), never from user input.
import fs from "node:fs";
import os from "node:os";
import execa from "execa";
import { LauncherError, LauncherErrorCode, errnoCode, errorMessage } from "../shared/errors.js";
import { LAUNCHER_CONFIG } from "../config/loader.js";
import type { ExitOutcome } from "../types/launch.js";
import { logger } from "../logger.js";

export type InvokeStrategy = "replace" | "spawn";

export interface Invoker {
  readonly strategy: InvokeStrategy;
  invoke(binaryPath: string, args: readonly string[]): ExitOutcome;
}

/** Shape of `process.execve` (Node.js 22.15+ / 23.11+, POSIX only). */
export type Execve = (file: string, args?: readonly string[], env?: NodeJS.ProcessEnv) => never;

/** The parts of `process` the invokers depend on. */
export interface InvokerHost {
  readonly platform: NodeJS.Platform;
  readonly env: NodeJS.ProcessEnv;
  readonly execve?: unknown;
}

/** Full argument vector for the binary: its own path, then the forwarded args untouched. */
export function buildArgv(binaryPath: string, args: readonly string[]): string[] {
  return [binaryPath, ...args];
}

/**
 * Fail with INVOCATION_FAILED when the binary cannot be executed.
 * Windows has no execute bit, so the check is skipped there.
 */
export function assertExecutable(binaryPath: string, platform: NodeJS.Platform): void {
  if (platform === "win32") return;
  try {
    fs.accessSync(binaryPath, fs.constants.X_OK);
  } catch (err) {
    const cause = errorMessage(err);
    if (errnoCode(err) === "EACCES") {
      throw new LauncherError(
        LauncherErrorCode.INVOCATION_FAILED,
        `Native binary at ${binaryPath} is not executable. ` +
          `Rebuild it with '${LAUNCHER_CONFIG.buildCommand}' or mark it executable.`,
        { binaryPath, cause },
      );
    }
    throw new LauncherError(LauncherErrorCode.INVOCATION_FAILED, cause, { binaryPath, cause });
  }
}

/** Shell convention for a child killed by a signal: 128 + signal number. */
export function signalExitCode(signal: string): ExitOutcome {
  const signals: Array<[string, number]> = Object.entries(os.constants.signals);
  const match = signals.find(([name]) => name === signal);
  return match ? 128 + match[1] : 1;
}

/** Replaces the current process image; on success control never comes back. */
export class ProcessReplacementInvoker implements Invoker {
  readonly strategy = "replace";

  constructor(
    private readonly execve: Execve,
    private readonly host: Pick<InvokerHost, "platform" | "env">,
  ) {}

  invoke(binaryPath: string, args: readonly string[]): never {
    assertExecutable(binaryPath, this.host.platform);
    const argv = buildArgv(binaryPath, args);
    logger.debug({ argv }, "Replacing process image");
    try {
      return this.execve(binaryPath, argv, this.host.env);
    } catch (err) {
      const cause = errorMessage(err);
      throw new LauncherError(LauncherErrorCode.INVOCATION_FAILED, cause, { binaryPath, cause });
    }
  }
}

/** Runs the binary as a child with inherited stdio and relays its exit code. */
export class SpawnAndWaitInvoker implements Invoker {
  readonly strategy = "spawn";

  constructor(private readonly host: Pick<InvokerHost, "platform" | "env">) {}

  invoke(binaryPath: string, args: readonly string[]): ExitOutcome {
    assertExecutable(binaryPath, this.host.platform);
    logger.debug({ argv: buildArgv(binaryPath, args) }, "Spawning native binary");

    const result = execa.sync(binaryPath, args, {
      stdio: "inherit",
      env: this.host.env,
      extendEnv: false,
      reject: false,
    });

    // originalMessage is only present when the child never started (EACCES, ENOENT, ...)
    if ("originalMessage" in result) {
      const cause = String(result.originalMessage);
      throw new LauncherError(LauncherErrorCode.INVOCATION_FAILED, cause, { binaryPath, cause });
    }
    if (result.signal) {
      logger.debug({ signal: result.signal }, "Native binary terminated by signal");
      return signalExitCode(result.signal);
    }
    return result.exitCode;
  }
}

function replacementCapability(host: InvokerHost): Execve | undefined {
  if (host.platform === "win32") return undefined;
  const execve = host.execve;
  if (typeof execve !== "function") return undefined;
  return (file, args, env) => {
    Reflect.apply(execve, host, [file, args, env]);
    throw new Error("execve returned without replacing the process");
  };
}

export function selectInvoker(host: InvokerHost): Invoker {
  const execve = replacementCapability(host);
  const invoker: Invoker = execve
    ? new ProcessReplacementInvoker(execve, host)
    : new SpawnAndWaitInvoker(host);
  logger.debug({ strategy: invoker.strategy, platform: host.platform }, "Invocation strategy selected");
  return invoker;
}
