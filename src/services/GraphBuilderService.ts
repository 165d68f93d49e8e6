/**
 * GraphBuilderService — Dependency Graph Builder
 *
 * Turns a parsed stack into a StackGraph: derived edges plus adjacency
 * lists in both directions, indexed by declaration position so the
 * planner and propagation engine get O(1) neighbour lookup.
 *
 * Every function here is pure; identical input ordering gives identical
 * output.
 */

import { createHash } from "node:crypto";
import { EXTERNAL_SOURCE_PREFIX } from "../types/index.js";
import type {
  AgentSpec,
  Edge,
  ParsedStack,
  SourceRef,
  StackGraph,
} from "../types/index.js";
import { UnknownReferenceError } from "../errors/index.js";

// ── Source references ────────────────────────────────────────────

/**
 * Parse an input `source` string.
 *
 *   "external:<id>"    → external source
 *   "<agent>.<output>" → agent output (split on the first ".")
 *
 * Returns null when the string matches neither form.
 */
export function parseSourceRef(source: string): SourceRef | null {
  if (source.startsWith(EXTERNAL_SOURCE_PREFIX)) {
    const id = source.slice(EXTERNAL_SOURCE_PREFIX.length).trim();
    return id ? { kind: "external", id } : null;
  }

  const dot = source.indexOf(".");
  if (dot <= 0 || dot === source.length - 1) return null;
  return {
    kind: "agent",
    agent: source.slice(0, dot),
    output: source.slice(dot + 1),
  };
}

export function formatSourceRef(ref: SourceRef): string {
  return ref.kind === "external"
    ? `${EXTERNAL_SOURCE_PREFIX}${ref.id}`
    : `${ref.agent}.${ref.output}`;
}

// ── Fingerprints ─────────────────────────────────────────────────

function sha256(value: unknown): string {
  return createHash("sha256").update(JSON.stringify(value)).digest("hex");
}

/** Content hash of a single agent declaration; used to reconcile run state. */
export function agentFingerprint(spec: AgentSpec): string {
  return sha256(spec);
}

// ── Builder ──────────────────────────────────────────────────────

function pushUnique(list: number[], value: number): void {
  if (!list.includes(value)) list.push(value);
}

/**
 * Materialize edges and adjacency for a parsed stack.
 *
 * Edges are emitted in consumer declaration order, then input order.
 * Assumes names are unique; a source naming an unknown agent throws
 * `UnknownReferenceError` (validation was skipped).
 */
export function buildStackGraph(stack: ParsedStack): StackGraph {
  const indexOf = new Map<string, number>();
  stack.agents.forEach((agent, i) => indexOf.set(agent.name, i));

  const transforms = new Map<string, string>();
  for (const flow of stack.dataFlow) {
    if (flow.transform !== undefined) {
      transforms.set(`${flow.from}->${flow.to}`, flow.transform);
    }
  }

  const edges: Edge[] = [];
  const consumersOf: number[][] = stack.agents.map(() => []);
  const producersOf: number[][] = stack.agents.map(() => []);
  const externalConsumers = new Map<string, number[]>();

  stack.agents.forEach((agent, consumerIndex) => {
    for (const input of agent.inputs) {
      const ref = parseSourceRef(input.source);
      if (ref === null) {
        throw new UnknownReferenceError(
          [input.source],
          `input ${agent.name}.${input.name} has a malformed source`,
        );
      }

      if (ref.kind === "external") {
        const list = externalConsumers.get(ref.id) ?? [];
        pushUnique(list, consumerIndex);
        externalConsumers.set(ref.id, list);
        continue;
      }

      const producerIndex = indexOf.get(ref.agent);
      if (producerIndex === undefined) {
        throw new UnknownReferenceError(
          [ref.agent],
          `input ${agent.name}.${input.name} reads from an undeclared agent`,
        );
      }

      edges.push({
        producer: ref.agent,
        output: ref.output,
        consumer: agent.name,
        input: input.name,
        transform:
          transforms.get(`${input.source}->${agent.name}.${input.name}`) ?? null,
      });
      pushUnique(consumersOf[producerIndex], consumerIndex);
      pushUnique(producersOf[consumerIndex], producerIndex);
    }
  });

  for (const list of consumersOf) list.sort((a, b) => a - b);
  for (const list of producersOf) list.sort((a, b) => a - b);
  for (const list of externalConsumers.values()) list.sort((a, b) => a - b);

  return {
    name: stack.name,
    policies: { ...stack.policies },
    agents: stack.agents,
    indexOf,
    edges,
    consumersOf,
    producersOf,
    externalConsumers,
    fingerprint: sha256({ agents: stack.agents, policies: stack.policies }),
  };
}

// ── Traversals ───────────────────────────────────────────────────

/**
 * Breadth-first forward traversal over producer → consumer edges.
 *
 * Returns every agent index reachable from `start`. A start index is
 * only part of the result when another start (or itself) reaches it.
 */
export function downstreamOf(
  graph: StackGraph,
  start: Iterable<number>,
): Set<number> {
  const reached = new Set<number>();
  const queue: number[] = [...start];

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const consumer of graph.consumersOf[current] ?? []) {
      if (!reached.has(consumer)) {
        reached.add(consumer);
        queue.push(consumer);
      }
    }
  }

  return reached;
}

/**
 * Depth-first cycle search with an explicit recursion stack.
 *
 * Every back edge yields one cycle, reported as agent names in
 * dependency order and closed on its first agent: `[A, B, C, A]`.
 * Rotations of an already reported cycle are dropped.
 */
export function findCycles(graph: StackGraph): string[][] {
  const WHITE = 0;
  const GREY = 1;
  const BLACK = 2;

  const colour: number[] = graph.agents.map(() => WHITE);
  const stack: number[] = [];
  const cycles: string[][] = [];
  const seen = new Set<string>();

  const visit = (node: number): void => {
    colour[node] = GREY;
    stack.push(node);

    for (const next of graph.consumersOf[node] ?? []) {
      if (colour[next] === GREY) {
        const loop = stack.slice(stack.indexOf(next));
        const key = [...loop].sort((a, b) => a - b).join(",");
        if (!seen.has(key)) {
          seen.add(key);
          cycles.push([...loop, next].map((i) => graph.agents[i].name));
        }
      } else if (colour[next] === WHITE) {
        visit(next);
      }
    }

    stack.pop();
    colour[node] = BLACK;
  };

  for (let i = 0; i < graph.agents.length; i++) {
    if (colour[i] === WHITE) visit(i);
  }

  return cycles;
}
