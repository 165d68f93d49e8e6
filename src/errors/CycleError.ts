/**
 * Thrown when a dependency cycle reaches the planner. The validator
 * rejects cycles first, so this only fires for graphs built by hand.
 */
export class CycleError extends Error {
  /** Ordered cycle path, closing on its first agent. */
  public readonly cycle: string[];

  constructor(cycle: string[]) {
    super(`CycleError: dependency cycle ${cycle.join(" -> ")}`);
    this.name = "CycleError";
    this.cycle = cycle;
    Object.setPrototypeOf(this, CycleError.prototype);
  }

  get agents(): string[] {
    return [...new Set(this.cycle)];
  }
}
