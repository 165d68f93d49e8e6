import { z } from "zod";
import { AgentSpecSchema } from "./AgentSpec.js";
import type { AgentSpec } from "./AgentSpec.js";

// ── Policies ─────────────────────────────────────────────────────

/**
 * Stack policies understood by the coordinator.
 *
 * auto_restart  — retry failed agents with exponential backoff.
 * cascade_stop  — fail not-yet-started downstream agents on a failure.
 * parallel_init — run agents of the same tier concurrently.
 */
export const RECOGNIZED_POLICIES = [
  "auto_restart",
  "cascade_stop",
  "parallel_init",
] as const;
export type PolicyName = (typeof RECOGNIZED_POLICIES)[number];

export type StackPolicies = Record<PolicyName, boolean>;

export const DEFAULT_POLICIES: StackPolicies = {
  auto_restart: false,
  cascade_stop: false,
  parallel_init: false,
};

export function isPolicyName(key: string): key is PolicyName {
  return RECOGNIZED_POLICIES.some((name) => name === key);
}

// ── Data-flow annotations ────────────────────────────────────────

/**
 * Optional explicit edge annotation. Used for documentation and
 * transform hints; cross-validated against the agents' inputs.
 */
export const DataFlowAnnotationSchema = z.object({
  /** `<agent>.<output>` */
  from: z.string().min(1),
  /** `<agent>.<input>` */
  to: z.string().min(1),
  transform: z.string().min(1).optional(),
});
export type DataFlowAnnotation = z.infer<typeof DataFlowAnnotationSchema>;

// ── Document ─────────────────────────────────────────────────────

/**
 * Stack declaration document (the parsed YAML file).
 *
 * Policies are kept as an open record here so unrecognized keys can be
 * reported as warnings instead of failing the parse.
 */
export const StackDocumentSchema = z.object({
  stack: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    agents: z.array(AgentSpecSchema).min(1),
    data_flow: z.array(DataFlowAnnotationSchema).default([]),
    policies: z.record(z.string(), z.unknown()).default({}),
    /** Policies the stack needs enabled and honoured. */
    requires: z.array(z.string()).default([]),
  }),
});
export type StackDocument = z.infer<typeof StackDocumentSchema>;

/** A document after shape and policy resolution, ready for the graph builder. */
export interface ParsedStack {
  name: string;
  agents: AgentSpec[];
  dataFlow: DataFlowAnnotation[];
  policies: StackPolicies;
}
