import { z } from "zod";

/**
 * Agent Status
 *
 * pending   — not yet run in the current plan.
 * running   — invocation in flight.
 * succeeded — last invocation produced every declared output.
 * failed    — terminal failure (or skipped by cascade_stop).
 * stale     — succeeded before, but an upstream output changed since.
 */
export const AgentStatusSchema = z.union([
  z.literal("pending"),
  z.literal("running"),
  z.literal("succeeded"),
  z.literal("failed"),
  z.literal("stale"),
]);
export type AgentStatus = z.infer<typeof AgentStatusSchema>;

export const AgentRunStateSchema = z.object({
  status: AgentStatusSchema,
  /** Output mapping from the last successful invocation. */
  last_output_value: z.record(z.string(), z.unknown()).nullable(),
  /** ISO 8601 datetime of the last invocation attempt. */
  last_run_timestamp: z.string().datetime().nullable(),
  /** Invocation attempts made in the most recent pass. */
  attempts: z.number().int().nonnegative(),
  /** Message of the last terminal failure. */
  error: z.string().nullable(),
  /** Content hash of the declaration this state was produced under. */
  spec_fingerprint: z.string(),
});
export type AgentRunState = z.infer<typeof AgentRunStateSchema>;

/**
 * Run State Schema
 *
 * Owned exclusively by the run coordinator. Persisted to
 * .agent-stack/run_state.json by the CLI between invocations.
 */
export const RunStateSchema = z.object({
  plan_version: z.string(),
  agents: z.record(z.string(), AgentRunStateSchema),
});
export type RunState = z.infer<typeof RunStateSchema>;
