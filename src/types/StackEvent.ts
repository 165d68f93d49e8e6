import { z } from "zod";

export const StackEventTypeSchema = z.union([
  z.literal("session_started"),
  z.literal("run_started"),
  z.literal("agent_started"),
  z.literal("agent_succeeded"),
  z.literal("agent_failed"),
  z.literal("agent_retry"),
  z.literal("agent_skipped"),
  z.literal("agent_stale"),
  z.literal("plan_reconciled"),
  z.literal("run_finished"),
]);
export type StackEventType = z.infer<typeof StackEventTypeSchema>;

/**
 * Stack Event Schema
 *
 * One line of the append-only event log. Downstream analysis agents read
 * the log through this schema; records are written in timestamp order.
 */
export const StackEventSchema = z.object({
  /** ISO 8601 datetime. */
  timestamp: z.string().datetime(),
  stack: z.string(),
  event: StackEventTypeSchema,
  agent: z.string().optional(),
  attempt: z.number().int().min(1).optional(),
  detail: z.record(z.string(), z.unknown()).optional(),
});
export type StackEvent = z.infer<typeof StackEventSchema>;
