import { z } from "zod";
import { MAX_TIMEOUT_MS } from "./AgentSpec.js";

/**
 * Runner Configuration Schema
 *
 * Tunable parameters for the run coordinator. Stored at
 * .agent-stack/config.json beside the stack file. Absence is expected;
 * consumers fall back to DEFAULT_RUNNER_CONFIG.
 */
export const RunnerConfigSchema = z.object({
  /** Total invocations per agent when auto_restart is enabled. */
  max_attempts: z.number().int().min(1).default(3),

  /** Delay before the first retry; doubles on every further attempt. */
  backoff_base_ms: z.number().int().min(0).default(250),

  /** Upper bound for a single backoff delay. */
  backoff_max_ms: z.number().int().min(0).default(10_000),

  /** Time budget for one agent invocation. */
  agent_timeout_ms: z.number().int().min(1).max(MAX_TIMEOUT_MS).default(60_000),

  /** Event log file name, relative to the .agent-stack directory. */
  event_log: z.string().min(1).default("events.jsonl"),
});

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

export const DEFAULT_RUNNER_CONFIG: RunnerConfig = {
  max_attempts: 3,
  backoff_base_ms: 250,
  backoff_max_ms: 10_000,
  agent_timeout_ms: 60_000,
  event_log: "events.jsonl",
};
