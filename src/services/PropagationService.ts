/**
 * PropagationService — change propagation
 *
 * Given the agents whose outputs just changed, compute every downstream
 * agent that has to re-run, ordered by the execution plan. An agent is
 * dirty if and only if one of its inputs reads from a dirty or changed
 * agent; siblings in the same tier are never pulled in.
 *
 * Pure and idempotent: the same frontier on the same graph always gives
 * the same dirty set.
 */

import type { DirtySet, ExecutionPlan, StackGraph } from "../types/index.js";
import { UnknownReferenceError } from "../errors/index.js";
import { downstreamOf } from "./GraphBuilderService.js";

/** Order a set of agent indices by plan tier, then tier position. */
function orderByPlan(
  graph: StackGraph,
  plan: ExecutionPlan,
  indices: Set<number>,
): { dirty: string[]; tiers: string[][] } {
  const dirty: string[] = [];
  const tiers: string[][] = [];

  for (const tier of plan.tiers) {
    const members = tier.filter((name) => {
      const i = graph.indexOf.get(name);
      return i !== undefined && indices.has(i);
    });
    if (members.length > 0) {
      tiers.push(members);
      dirty.push(...members);
    }
  }

  return { dirty, tiers };
}

/**
 * Dirty set for a frontier of changed agents.
 *
 * Frontier agents only appear in the result when another frontier agent
 * feeds them.
 *
 * @throws UnknownReferenceError — a frontier name is not in the graph
 */
export function computeDirtySet(
  graph: StackGraph,
  plan: ExecutionPlan,
  changed: readonly string[],
): DirtySet {
  const unknown = changed.filter((name) => !graph.indexOf.has(name));
  if (unknown.length > 0) {
    throw new UnknownReferenceError(unknown, "changed agents are not declared in the stack");
  }

  const frontier = [...new Set(changed)];
  const start = frontier.flatMap((name) => {
    const i = graph.indexOf.get(name);
    return i === undefined ? [] : [i];
  });

  const { dirty, tiers } = orderByPlan(graph, plan, downstreamOf(graph, start));
  return { frontier, dirty, tiers };
}

/**
 * Dirty set for re-fed external sources: their direct consumers plus
 * everything downstream of those. External sources are never dirty on
 * their own.
 *
 * @throws UnknownReferenceError — no agent reads a given external id
 */
export function computeExternalDirtySet(
  graph: StackGraph,
  plan: ExecutionPlan,
  externalIds: readonly string[],
): DirtySet {
  const unknown = externalIds.filter((id) => !graph.externalConsumers.has(id));
  if (unknown.length > 0) {
    throw new UnknownReferenceError(
      unknown.map((id) => `external:${id}`),
      "no agent reads these external sources",
    );
  }

  const frontier = [...new Set(externalIds)];
  const direct = new Set<number>();
  for (const id of frontier) {
    for (const i of graph.externalConsumers.get(id) ?? []) direct.add(i);
  }

  const reached = downstreamOf(graph, direct);
  for (const i of direct) reached.add(i);

  const { dirty, tiers } = orderByPlan(graph, plan, reached);
  return { frontier, dirty, tiers };
}
