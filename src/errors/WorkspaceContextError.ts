/**
 * Thrown when a workspace context file exists but cannot be used
 * (unparseable, or no `workspace` defined).
 */
export class WorkspaceContextError extends Error {
  public readonly path: string;

  constructor(filePath: string, reason: string) {
    super(`WorkspaceContextError: ${filePath} — ${reason}`);
    this.name = "WorkspaceContextError";
    this.path = filePath;
    Object.setPrototypeOf(this, WorkspaceContextError.prototype);
  }
}
