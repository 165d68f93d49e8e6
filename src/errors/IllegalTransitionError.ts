import type { AgentStatus } from "../types/index.js";

/**
 * Thrown when the coordinator attempts a status change the agent state
 * machine does not allow, e.g. starting an agent that is already running.
 */
export class IllegalTransitionError extends Error {
  public readonly agent: string;
  public readonly from: AgentStatus;
  public readonly to: AgentStatus;

  constructor(agent: string, from: AgentStatus, to: AgentStatus) {
    super(`IllegalTransitionError: agent ${agent} cannot move from ${from} to ${to}`);
    this.name = "IllegalTransitionError";
    this.agent = agent;
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, IllegalTransitionError.prototype);
  }
}
