/**
 * An agent implementation failed, timed out or returned an incomplete
 * output mapping. Local to the agent; the coordinator records it in the
 * run report.
 */
export class ExecutionError extends Error {
  public readonly agent: string;
  public readonly attempts: number;
  public readonly timedOut: boolean;
  public override readonly cause: unknown;

  constructor(
    agent: string,
    message: string,
    options: { attempts?: number; timedOut?: boolean; cause?: unknown } = {},
  ) {
    super(`ExecutionError: agent ${agent} — ${message}`);
    this.name = "ExecutionError";
    this.agent = agent;
    this.attempts = options.attempts ?? 1;
    this.timedOut = options.timedOut ?? false;
    this.cause = options.cause;
    Object.setPrototypeOf(this, ExecutionError.prototype);
  }
}
