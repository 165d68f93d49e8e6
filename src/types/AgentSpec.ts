import { z } from "zod";

/**
 * Agent names double as the left half of `<agent>.<output>` source
 * references, so `.` and `:` are not allowed.
 */
export const AGENT_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_-]*$/;

/** Type tag that is compatible with every other type tag. */
export const ANY_TYPE = "any";

/** Prefix marking an input that is resolved outside the graph. */
export const EXTERNAL_SOURCE_PREFIX = "external:";

/** Largest delay a Node.js timer accepts; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const AgentInputSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default(ANY_TYPE),
  /** `<agent>.<output>` or `external:<id>`. */
  source: z.string().min(1),
});
export type AgentInput = z.infer<typeof AgentInputSchema>;

export const AgentOutputSchema = z.object({
  name: z.string().min(1),
  type: z.string().min(1).default(ANY_TYPE),
});
export type AgentOutput = z.infer<typeof AgentOutputSchema>;

/**
 * Where the callable for an agent lives. `path` is resolved relative to
 * the stack file; `export` names the export to call (default export when
 * omitted).
 */
export const ImplementationRefSchema = z.object({
  path: z.string().min(1),
  export: z.string().min(1).optional(),
});
export type ImplementationRef = z.infer<typeof ImplementationRefSchema>;

/**
 * AgentSpec — a named unit of computation.
 *
 * `layer` is advisory grouping only; ordering always comes from the
 * dependency graph.
 */
export const AgentSpecSchema = z.object({
  name: z
    .string()
    .regex(AGENT_NAME_PATTERN, "agent names may only contain letters, digits, '_' and '-'"),
  layer: z.number().int().nonnegative().default(0),
  description: z.string().optional(),
  implementation: ImplementationRefSchema.optional(),
  /** Per-agent time budget; overrides `agent_timeout_ms` from the runner config. */
  timeout_ms: z.number().int().positive().max(MAX_TIMEOUT_MS).optional(),
  inputs: z.array(AgentInputSchema).default([]),
  outputs: z.array(AgentOutputSchema).default([]),
});
export type AgentSpec = z.infer<typeof AgentSpecSchema>;
