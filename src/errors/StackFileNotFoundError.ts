/**
 * Thrown when a required stack file is not found on disk.
 */
export class StackFileNotFoundError extends Error {
  public readonly path: string;

  constructor(filePath: string) {
    super(`StackFileNotFoundError: file not found — ${filePath}`);
    this.name = "StackFileNotFoundError";
    this.path = filePath;
    Object.setPrototypeOf(this, StackFileNotFoundError.prototype);
  }
}
