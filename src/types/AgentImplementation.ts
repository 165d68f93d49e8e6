/**
 * Agent implementation contract.
 *
 * An implementation receives its declared inputs by name and either
 * produces every declared output or reports a failure. Failures are a
 * distinct result, never an ordinary output value; thrown errors and
 * timeouts are treated the same way by the coordinator.
 */

export type AgentResult =
  | { ok: true; outputs: Record<string, unknown> }
  | { ok: false; error: string };

export interface AgentInvocationContext {
  agent: string;
  /** 1-based attempt number within the current pass. */
  attempt: number;
  /** Aborted when the invocation's time budget expires. */
  signal: AbortSignal;
}

export type AgentImplementation = (
  inputs: Record<string, unknown>,
  context: AgentInvocationContext,
) => AgentResult | Promise<AgentResult>;

/** Runtime guard for values returned by dynamically loaded implementations. */
export function isAgentResult(value: unknown): value is AgentResult {
  if (typeof value !== "object" || value === null || !("ok" in value)) {
    return false;
  }
  if (value.ok === true) {
    return (
      "outputs" in value &&
      typeof value.outputs === "object" &&
      value.outputs !== null
    );
  }
  return value.ok === false && "error" in value && typeof value.error === "string";
}
