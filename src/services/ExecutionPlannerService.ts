/**
 * ExecutionPlannerService — tiered execution plans
 *
 * Kahn's algorithm, collecting every agent whose unresolved dependency
 * count is zero into the next tier. Within a tier agents keep their
 * declaration order, so identical input always yields an identical plan.
 */

import type { ExecutionPlan, StackGraph } from "../types/index.js";
import { CycleError, UnknownReferenceError } from "../errors/index.js";
import { findCycles } from "./GraphBuilderService.js";

/** Length of the fingerprint prefix used as the plan version. */
const PLAN_VERSION_LENGTH = 12;

/** Plan version derived from the graph content. */
export function planVersion(graph: StackGraph): string {
  return graph.fingerprint.slice(0, PLAN_VERSION_LENGTH);
}

/**
 * Reject graphs whose adjacency was never materialized, or whose edges
 * name agents the graph does not hold.
 */
function assertBuilt(graph: StackGraph): void {
  const count = graph.agents.length;
  if (graph.consumersOf.length !== count || graph.producersOf.length !== count) {
    throw new UnknownReferenceError(
      [graph.name],
      "graph has no adjacency lists; build it with buildStackGraph first",
    );
  }

  const unknown = new Set<string>();
  for (const edge of graph.edges) {
    if (!graph.indexOf.has(edge.producer)) unknown.add(edge.producer);
    if (!graph.indexOf.has(edge.consumer)) unknown.add(edge.consumer);
  }
  if (unknown.size > 0) {
    throw new UnknownReferenceError([...unknown], "edges reference agents missing from the graph");
  }
}

/**
 * Compute the execution plan for a validated graph.
 *
 * @throws UnknownReferenceError — graph did not come from the builder
 * @throws CycleError            — agents left unplaced by a cycle
 */
export function computeExecutionPlan(graph: StackGraph): ExecutionPlan {
  assertBuilt(graph);

  const remaining = graph.producersOf.map((producers) => producers.length);
  const placed = new Array<boolean>(graph.agents.length).fill(false);
  const tiers: string[][] = [];

  let frontier: number[] = [];
  remaining.forEach((count, i) => {
    if (count === 0) frontier.push(i);
  });

  let placedCount = 0;
  while (frontier.length > 0) {
    frontier.sort((a, b) => a - b);
    tiers.push(frontier.map((i) => graph.agents[i].name));

    const next: number[] = [];
    for (const i of frontier) {
      placed[i] = true;
      placedCount++;
      for (const consumer of graph.consumersOf[i]) {
        remaining[consumer]--;
        if (remaining[consumer] === 0) next.push(consumer);
      }
    }
    frontier = next;
  }

  if (placedCount < graph.agents.length) {
    const cycles = findCycles(graph);
    const unplaced = graph.agents
      .filter((_, i) => !placed[i])
      .map((a) => a.name);
    throw new CycleError(cycles[0] ?? unplaced);
  }

  return Object.freeze({
    stack: graph.name,
    version: planVersion(graph),
    tiers: Object.freeze(tiers.map((tier) => Object.freeze(tier))),
  });
}

/** Tier position of every agent in a plan. */
export function tierIndex(plan: ExecutionPlan): Map<string, number> {
  const index = new Map<string, number>();
  plan.tiers.forEach((tier, t) => {
    for (const name of tier) index.set(name, t);
  });
  return index;
}
