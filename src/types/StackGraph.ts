import type { AgentSpec } from "./AgentSpec.js";
import type { StackPolicies } from "./StackDocument.js";

/** Resolved form of an input's `source` string. */
export type SourceRef =
  | { kind: "agent"; agent: string; output: string }
  | { kind: "external"; id: string };

/** Derived `(producer, output) → (consumer, input)` data-flow edge. */
export interface Edge {
  producer: string;
  output: string;
  consumer: string;
  input: string;
  /** Transform hint from a matching data_flow annotation. */
  transform: string | null;
}

/**
 * StackGraph — validated agents plus derived edges and index-based
 * adjacency. Agent indices are declaration positions.
 */
export interface StackGraph {
  readonly name: string;
  readonly policies: StackPolicies;
  readonly agents: readonly AgentSpec[];
  readonly indexOf: ReadonlyMap<string, number>;
  readonly edges: readonly Edge[];
  /** producer index → consumer indices (deduplicated, ascending). */
  readonly consumersOf: readonly (readonly number[])[];
  /** consumer index → producer indices (deduplicated, ascending). */
  readonly producersOf: readonly (readonly number[])[];
  /** external source id → consumer indices (deduplicated, ascending). */
  readonly externalConsumers: ReadonlyMap<string, readonly number[]>;
  /** SHA-256 over the canonical agent list and policies. */
  readonly fingerprint: string;
}

/**
 * ExecutionPlan — ordered tiers of agents with no dependency between
 * members of the same tier. Immutable once computed.
 */
export interface ExecutionPlan {
  readonly stack: string;
  readonly version: string;
  readonly tiers: readonly (readonly string[])[];
}

/** Result of a change-propagation query. */
export interface DirtySet {
  /** The changed agents or re-fed external ids, as given. */
  readonly frontier: readonly string[];
  /** Agents to re-run, in plan order. */
  readonly dirty: readonly string[];
  /** `dirty` grouped by plan tier (empty tiers omitted). */
  readonly tiers: readonly (readonly string[])[];
}
