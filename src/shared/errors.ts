export enum LauncherErrorCode {
  BINARY_NOT_FOUND = "BINARY_NOT_FOUND",
  INVOCATION_FAILED = "INVOCATION_FAILED",
}

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: LauncherErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "LauncherError";
    this.code = code;
    this.context = context;
  }
}

// Node system errors may come from another realm (a test runner's vm context):
// detect them by shape, never with `instanceof Error`.

/** Message text of anything thrown, for the `Error: <message>` line. */
export function errorMessage(err: unknown): string {
  if (typeof err === "object" && err !== null && "message" in err && typeof err.message === "string") {
    return err.message;
  }
  return String(err);
}

/** errno code (ENOENT, EACCES, ...) of a Node system error, if it has one. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
