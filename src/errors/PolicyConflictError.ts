import type { StackIssue } from "../types/index.js";

/**
 * Thrown when a stack requires a policy the runtime does not recognize,
 * or requires one that its own policies disable.
 */
export class PolicyConflictError extends Error {
  public readonly policies: string[];
  public readonly issues: StackIssue[];

  constructor(policies: string[], issues: StackIssue[]) {
    super(
      `PolicyConflictError: cannot honour required policies ${policies.join(", ")}\n` +
        issues.map((i) => `  ${i.message}`).join("\n"),
    );
    this.name = "PolicyConflictError";
    this.policies = policies;
    this.issues = issues;
    Object.setPrototypeOf(this, PolicyConflictError.prototype);
  }
}
