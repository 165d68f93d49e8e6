/**
 * Thrown when a run-state write or an event-log append fails.
 *
 * Carries the target path plus the underlying cause so callers can
 * decide whether to retry or surface the error.
 */
export class StackWriteError extends Error {
  public readonly path: string;
  public override readonly cause: unknown;

  constructor(filePath: string, cause: unknown) {
    const reason =
      cause instanceof Error ? cause.message : String(cause);
    super(`StackWriteError: failed to write ${filePath} — ${reason}`);
    this.name = "StackWriteError";
    this.path = filePath;
    this.cause = cause;
    Object.setPrototypeOf(this, StackWriteError.prototype);
  }
}
