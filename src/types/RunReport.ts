import type { AgentStatus } from "./RunState.js";

export interface AgentReport {
  agent: string;
  status: AgentStatus;
  attempts: number;
  /** True when the agent was never invoked because an upstream agent failed. */
  skipped: boolean;
  error: string | null;
  duration_ms: number;
}

export interface RunFailure {
  agent: string;
  message: string;
  attempts: number;
  timed_out: boolean;
}

/** A terminally failed agent together with the dependents it took down. */
export interface FailureBoundary {
  failed: string;
  skipped: string[];
}

export interface RunReport {
  stack: string;
  plan_version: string;
  started_at: string;
  finished_at: string;
  outcome: "succeeded" | "failed";
  /** Agents scheduled in this pass, in plan order. */
  agents: AgentReport[];
  failures: RunFailure[];
  failure_boundaries: FailureBoundary[];
}
