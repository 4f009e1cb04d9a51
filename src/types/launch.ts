import type { LauncherError } from "../shared/errors.js";

/** An existing, non-directory path to the native binary. */
export interface BinaryLocation {
  readonly path: string;
}

export type ResolveResult =
  | { readonly ok: true; readonly location: BinaryLocation }
  | { readonly ok: false; readonly error: LauncherError };

/** Exit code handed back to whatever invoked the launcher. */
export type ExitOutcome = number;

export type LaunchState = "idle" | "resolved" | "invoked" | "failed";
