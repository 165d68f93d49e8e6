import type { ZodError } from "zod";
import type { StackIssue } from "../types/index.js";

/**
 * Thrown when a stack declaration (or a file read alongside it) fails
 * validation. Carries every issue found in the pass; nothing from an
 * invalid declaration is ever applied.
 */
export class StackValidationError extends Error {
  public readonly source: string;
  public readonly issues: StackIssue[];

  constructor(source: string, issues: StackIssue[]) {
    const brief = issues
      .map((i) => `  [${i.code}] ${i.message}`)
      .join("\n");

    super(
      `StackValidationError: ${source} failed validation.\n` +
        `  Issues:\n${brief}`,
    );

    this.name = "StackValidationError";
    this.source = source;
    this.issues = issues;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, StackValidationError.prototype);
  }

  /** All agent names mentioned by the issues, deduplicated. */
  get agents(): string[] {
    return [...new Set(this.issues.flatMap((i) => i.agents))];
  }

  static fromZodError(source: string, zodError: ZodError): StackValidationError {
    return new StackValidationError(source, zodIssuesToStackIssues(zodError));
  }
}

/** Maps a Zod issue path to the agent names it concerns. */
export type IssueAgentResolver = (path: (string | number)[]) => string[];

/**
 * Convert Zod issues into `schema` stack issues, keeping the document
 * path so the offending field can be located.
 */
export function zodIssuesToStackIssues(
  zodError: ZodError,
  agentsAt: IssueAgentResolver = () => [],
): StackIssue[] {
  return zodError.issues.map((i): StackIssue => {
    const path = i.path.join(".");
    return {
      code: "schema",
      message: path ? `${path}: ${i.message}` : i.message,
      agents: agentsAt(i.path),
      path,
    };
  });
}
