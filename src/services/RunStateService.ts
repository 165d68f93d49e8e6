/**
 * RunStateService — per-agent state machine
 *
 * Every function returns a **new** RunState and never mutates its input.
 * The run coordinator is the only caller that writes the result back.
 *
 *   pending ──▶ running ──▶ succeeded ──▶ stale ──▶ running
 *      │           │                       │
 *      └──────────▶└──────▶ failed ◀───────┘
 *                             │
 *                             └──▶ pending (re-queued after an upstream change)
 */

import type {
  AgentRunState,
  AgentStatus,
  ExecutionPlan,
  RunState,
  StackGraph,
} from "../types/index.js";
import { IllegalTransitionError, UnknownReferenceError } from "../errors/index.js";
import { agentFingerprint, downstreamOf } from "./GraphBuilderService.js";

const ALLOWED_TRANSITIONS: Record<AgentStatus, readonly AgentStatus[]> = {
  pending: ["running", "failed"],
  running: ["succeeded", "failed"],
  succeeded: ["stale"],
  failed: ["pending"],
  stale: ["running", "failed"],
};

export function canTransition(from: AgentStatus, to: AgentStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

function freshAgentState(fingerprint: string): AgentRunState {
  return {
    status: "pending",
    last_output_value: null,
    last_run_timestamp: null,
    attempts: 0,
    error: null,
    spec_fingerprint: fingerprint,
  };
}

/** Initial state: every agent pending. */
export function createRunState(graph: StackGraph, plan: ExecutionPlan): RunState {
  const agents: Record<string, AgentRunState> = {};
  for (const spec of graph.agents) {
    agents[spec.name] = freshAgentState(agentFingerprint(spec));
  }
  return { plan_version: plan.version, agents };
}

function requireAgent(state: RunState, agent: string): AgentRunState {
  const current = state.agents[agent];
  if (current === undefined) {
    throw new UnknownReferenceError([agent], "agent has no run state");
  }
  return current;
}

type AgentPatch = Partial<Omit<AgentRunState, "status" | "spec_fingerprint">>;

/**
 * Move one agent to `to`, applying `patch` to its other fields.
 *
 * @throws IllegalTransitionError — the state machine forbids the move
 * @throws UnknownReferenceError  — the agent is not part of the state
 */
export function transitionAgent(
  state: RunState,
  agent: string,
  to: AgentStatus,
  patch: AgentPatch = {},
): RunState {
  const current = requireAgent(state, agent);
  if (!canTransition(current.status, to)) {
    throw new IllegalTransitionError(agent, current.status, to);
  }
  return {
    ...state,
    agents: {
      ...state.agents,
      [agent]: { ...current, ...patch, status: to },
    },
  };
}

/** Update fields of one agent without changing its status. */
export function updateAgent(
  state: RunState,
  agent: string,
  patch: AgentPatch,
): RunState {
  const current = requireAgent(state, agent);
  return {
    ...state,
    agents: {
      ...state.agents,
      [agent]: { ...current, ...patch },
    },
  };
}

/**
 * Apply a dirty set: succeeded agents become stale and failed agents are
 * re-queued as pending. Pending, stale and running agents are left alone.
 *
 * Returns the new state and the agents whose status changed.
 */
export function markDirty(
  state: RunState,
  dirty: readonly string[],
): { state: RunState; marked: string[] } {
  let next = state;
  const marked: string[] = [];

  for (const agent of dirty) {
    const status = requireAgent(next, agent).status;
    if (status === "succeeded") {
      next = transitionAgent(next, agent, "stale");
      marked.push(agent);
    } else if (status === "failed") {
      next = transitionAgent(next, agent, "pending", { error: null });
      marked.push(agent);
    }
  }

  return { state: next, marked };
}

export interface ReconcileResult {
  state: RunState;
  added: string[];
  removed: string[];
  changed: string[];
  /** Agents that must re-run because they or an upstream agent changed. */
  invalidated: string[];
}

/**
 * Reconcile an existing RunState against a recomputed plan.
 *
 * Removed agents are dropped and new agents start pending. An agent
 * whose declaration changed, and everything downstream of it, loses its
 * succeeded status: stale if it has outputs from an earlier run,
 * pending otherwise.
 */
export function reconcileRunState(
  previous: RunState,
  graph: StackGraph,
  plan: ExecutionPlan,
): ReconcileResult {
  const agents: Record<string, AgentRunState> = {};
  const added: string[] = [];
  const changed: string[] = [];
  const changedIndices: number[] = [];

  graph.agents.forEach((spec, i) => {
    const fingerprint = agentFingerprint(spec);
    const prior = previous.agents[spec.name];

    if (prior === undefined) {
      added.push(spec.name);
      agents[spec.name] = freshAgentState(fingerprint);
      return;
    }

    // A persisted "running" state means the previous process died mid-run.
    const status: AgentStatus = prior.status === "running" ? "pending" : prior.status;
    agents[spec.name] = { ...prior, status, spec_fingerprint: fingerprint };

    if (prior.spec_fingerprint !== fingerprint) {
      changed.push(spec.name);
      changedIndices.push(i);
    }
  });

  const removed = Object.keys(previous.agents).filter((name) => !graph.indexOf.has(name));

  const affected = downstreamOf(graph, changedIndices);
  for (const i of changedIndices) affected.add(i);

  const invalidated: string[] = [];
  for (const tier of plan.tiers) {
    for (const name of tier) {
      const i = graph.indexOf.get(name);
      if (i === undefined || !affected.has(i)) continue;
      const current = agents[name];
      if (current.status === "succeeded" || current.status === "stale") {
        agents[name] = { ...current, status: "stale" };
      } else {
        agents[name] = { ...current, status: "pending", error: null };
      }
      invalidated.push(name);
    }
  }

  return {
    state: { plan_version: plan.version, agents },
    added,
    removed,
    changed,
    invalidated,
  };
}
