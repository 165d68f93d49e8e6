/**
 * Shared fixtures for the service tests: raw stack documents, validated
 * graphs and in-memory collaborators for the run coordinator.
 */

import { AgentSpecSchema } from "../types/index.js";
import type {
  AgentImplementation,
  AgentResult,
  AgentSpec,
  StackEvent,
  StackGraph,
} from "../types/index.js";
import type { EventLogLike } from "../services/EventLogService.js";
import { assertValidStack } from "../services/SchemaValidatorService.js";

// ---------------------------------------------------------------------------
// Stack documents
// ---------------------------------------------------------------------------

export interface RawAgent {
  name: string;
  layer?: number;
  description?: string;
  timeout_ms?: number;
  implementation?: { path: string; export?: string };
  inputs?: { name: string; type?: string; source: string }[];
  outputs?: { name: string; type?: string }[];
}

export interface RawStackOptions {
  name?: string;
  policies?: Record<string, unknown>;
  requires?: string[];
  data_flow?: { from: string; to: string; transform?: string }[];
}

export function makeStackDocument(
  agents: RawAgent[],
  options: RawStackOptions = {},
): { stack: Record<string, unknown> } {
  return {
    stack: {
      name: options.name ?? "test-stack",
      agents,
      ...(options.policies !== undefined ? { policies: options.policies } : {}),
      ...(options.requires !== undefined ? { requires: options.requires } : {}),
      ...(options.data_flow !== undefined ? { data_flow: options.data_flow } : {}),
    },
  };
}

/** Validate a raw document and return its graph; throws when invalid. */
export function makeGraph(agents: RawAgent[], options: RawStackOptions = {}): StackGraph {
  return assertValidStack(makeStackDocument(agents, options)).graph;
}

/** Parse a raw agent through the schema so defaults are applied. */
export function makeSpec(agent: RawAgent): AgentSpec {
  return AgentSpecSchema.parse(agent);
}

/** A → B → C, each passing one value along. */
export function chainAgents(): RawAgent[] {
  return [
    { name: "A", outputs: [{ name: "x", type: "number" }] },
    {
      name: "B",
      inputs: [{ name: "a", type: "number", source: "A.x" }],
      outputs: [{ name: "y", type: "number" }],
    },
    {
      name: "C",
      inputs: [{ name: "b", type: "number", source: "B.y" }],
      outputs: [{ name: "z", type: "number" }],
    },
  ];
}

/** A reads C, B reads A, C reads B. */
export function cycleAgents(): RawAgent[] {
  return [
    { name: "A", inputs: [{ name: "c", source: "C.z" }], outputs: [{ name: "x" }] },
    { name: "B", inputs: [{ name: "a", source: "A.x" }], outputs: [{ name: "y" }] },
    { name: "C", inputs: [{ name: "b", source: "B.y" }], outputs: [{ name: "z" }] },
  ];
}

// ---------------------------------------------------------------------------
// Implementations
// ---------------------------------------------------------------------------

export function ok(outputs: Record<string, unknown>): AgentResult {
  return { ok: true, outputs };
}

export function fail(error: string): AgentResult {
  return { ok: false, error };
}

/** Wraps an implementation and counts its invocations. */
export function counted(implementation: AgentImplementation): {
  fn: AgentImplementation;
  readonly calls: number;
} {
  let calls = 0;
  return {
    fn: (inputs, context) => {
      calls++;
      return implementation(inputs, context);
    },
    get calls() {
      return calls;
    },
  };
}

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

/** Event log that keeps every appended event in memory. */
export class MemoryEventLog implements EventLogLike {
  public readonly events: StackEvent[] = [];

  async append(event: StackEvent): Promise<void> {
    this.events.push(event);
  }

  types(): string[] {
    return this.events.map((e) => (e.agent ? `${e.event}:${e.agent}` : e.event));
  }
}

/** Output channel mock (appendLine only) that records every line. */
export function makeOutputChannel(): { appendLine: (msg: string) => void; lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    appendLine: (msg: string) => {
      lines.push(msg);
    },
  };
}

/** Sleep stub that records the requested delays and resolves at once. */
export function makeSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}
