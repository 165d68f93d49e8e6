/**
 * Thrown when a name does not resolve against the stack graph: an
 * input source, a changed-agent name passed to propagation, or an edge
 * in a graph that never went through the builder.
 */
export class UnknownReferenceError extends Error {
  public readonly references: string[];

  constructor(references: string[], detail?: string) {
    super(
      `UnknownReferenceError: unknown reference(s) ${references.join(", ")}` +
        (detail ? ` — ${detail}` : ""),
    );
    this.name = "UnknownReferenceError";
    this.references = references;
    Object.setPrototypeOf(this, UnknownReferenceError.prototype);
  }
}
