/**
 * SchemaValidatorService — stack declaration validation
 *
 * validateStack is a PURE FUNCTION: raw document in, either a validated
 * StackGraph or the full list of issues out. A partial graph is never
 * returned.
 *
 * Check order:
 *   0. Document shape (Zod) and policy resolution
 *   a. Agent name uniqueness, output name uniqueness per agent
 *   b. Every input source resolves, with compatible types
 *   c. No fan-in ambiguity; data_flow annotations match the inputs
 *   d. Acyclicity — only when a–c found nothing
 */

import {
  ANY_TYPE,
  DEFAULT_POLICIES,
  StackDocumentSchema,
  isPolicyName,
} from "../types/index.js";
import type {
  AgentSpec,
  ParsedStack,
  StackDocument,
  StackGraph,
  StackIssue,
  StackPolicies,
  StackWarning,
} from "../types/index.js";
import {
  PolicyConflictError,
  StackValidationError,
  zodIssuesToStackIssues,
} from "../errors/index.js";
import {
  buildStackGraph,
  findCycles,
  parseSourceRef,
} from "./GraphBuilderService.js";

export type ValidationResult =
  | { ok: true; graph: StackGraph; warnings: StackWarning[] }
  | { ok: false; errors: StackIssue[]; warnings: StackWarning[] };

// ── Policies ─────────────────────────────────────────────────────

interface PolicyResolution {
  policies: StackPolicies;
  errors: StackIssue[];
  warnings: StackWarning[];
}

/**
 * Resolve the open `policies` record into StackPolicies.
 *
 * Recognized keys must be booleans. Unrecognized keys are warnings.
 * A `requires` entry that is unrecognized, or recognized but not
 * enabled, is a policy conflict.
 */
export function resolvePolicies(
  raw: Record<string, unknown>,
  requires: string[],
): PolicyResolution {
  const policies: StackPolicies = { ...DEFAULT_POLICIES };
  const errors: StackIssue[] = [];
  const warnings: StackWarning[] = [];

  for (const [key, value] of Object.entries(raw)) {
    if (!isPolicyName(key)) {
      warnings.push({
        code: "unknown_policy",
        message: `policy "${key}" is not recognized and will be ignored`,
        agents: [],
        path: `stack.policies.${key}`,
      });
      continue;
    }
    if (typeof value !== "boolean") {
      errors.push({
        code: "schema",
        message: `stack.policies.${key}: expected boolean, received ${typeof value}`,
        agents: [],
        path: `stack.policies.${key}`,
      });
      continue;
    }
    policies[key] = value;
  }

  requires.forEach((name, i) => {
    if (!isPolicyName(name)) {
      errors.push({
        code: "policy_conflict",
        message: `required policy "${name}" is not supported by this runtime`,
        agents: [],
        policy: name,
        path: `stack.requires.${i}`,
      });
    } else if (!policies[name]) {
      errors.push({
        code: "policy_conflict",
        message: `policy "${name}" is required but not enabled in stack.policies`,
        agents: [],
        policy: name,
        path: `stack.requires.${i}`,
      });
    }
  });

  return { policies, errors, warnings };
}

// ── Structural checks ────────────────────────────────────────────

function typesCompatible(produced: string, consumed: string): boolean {
  return produced === consumed || produced === ANY_TYPE || consumed === ANY_TYPE;
}

/** (a) Every agent name is declared exactly once. */
function checkNameUniqueness(agents: AgentSpec[]): StackIssue[] {
  const counts = new Map<string, number>();
  for (const agent of agents) {
    counts.set(agent.name, (counts.get(agent.name) ?? 0) + 1);
  }

  const issues: StackIssue[] = [];
  for (const [name, count] of counts) {
    if (count > 1) {
      issues.push({
        code: "duplicate_name",
        message: `agent name "${name}" is declared ${count} times`,
        agents: [name],
      });
    }
  }
  return issues;
}

/**
 * (a) Every output name is declared once per agent, so a source
 * reference binds to exactly one type contract.
 */
function checkOutputUniqueness(agents: AgentSpec[]): StackIssue[] {
  const issues: StackIssue[] = [];

  agents.forEach((agent, i) => {
    const seen = new Set<string>();
    agent.outputs.forEach((output, j) => {
      if (seen.has(output.name)) {
        issues.push({
          code: "duplicate_output",
          message: `output ${agent.name}.${output.name} is declared more than once`,
          agents: [agent.name],
          path: `stack.agents.${i}.outputs.${j}`,
        });
      } else {
        seen.add(output.name);
      }
    });
  });

  return issues;
}

/** (b) Every input source parses and resolves to a declared output. */
function checkSources(
  agents: AgentSpec[],
  byName: Map<string, AgentSpec>,
  warnings: StackWarning[],
): StackIssue[] {
  const issues: StackIssue[] = [];

  agents.forEach((agent, i) => {
    agent.inputs.forEach((input, j) => {
      const path = `stack.agents.${i}.inputs.${j}.source`;
      const ref = parseSourceRef(input.source);

      if (ref === null) {
        issues.push({
          code: "invalid_source",
          message:
            `input ${agent.name}.${input.name} has source "${input.source}"; ` +
            `expected "<agent>.<output>" or "external:<id>"`,
          agents: [agent.name],
          path,
        });
        return;
      }
      if (ref.kind === "external") return;

      const producer = byName.get(ref.agent);
      if (producer === undefined) {
        issues.push({
          code: "unknown_reference",
          message: `input ${agent.name}.${input.name} reads from undeclared agent "${ref.agent}"`,
          agents: [agent.name, ref.agent],
          path,
        });
        return;
      }

      const output = producer.outputs.find((o) => o.name === ref.output);
      if (output === undefined) {
        issues.push({
          code: "unknown_reference",
          message:
            `input ${agent.name}.${input.name} reads "${ref.output}", ` +
            `which agent ${producer.name} does not declare as an output`,
          agents: [agent.name, producer.name],
          path,
        });
        return;
      }

      if (!typesCompatible(output.type, input.type)) {
        issues.push({
          code: "type_mismatch",
          message:
            `input ${agent.name}.${input.name} expects ${input.type} but ` +
            `${producer.name}.${output.name} produces ${output.type}`,
          agents: [agent.name, producer.name],
          path,
        });
      }

      if (agent.layer < producer.layer) {
        warnings.push({
          code: "layer_inversion",
          message:
            `agent ${agent.name} (layer ${agent.layer}) consumes ${producer.name} ` +
            `(layer ${producer.layer}); layers are advisory and do not affect ordering`,
          agents: [agent.name, producer.name],
          path,
        });
      }
    });
  });

  return issues;
}

/**
 * (c) An input binds to exactly one source.
 *
 * Fan-in shows up as an input name declared twice on the same agent, or
 * as a data_flow annotation binding an input to a different producer
 * than its declared source.
 */
function checkFanIn(stack: StackDocument["stack"], byName: Map<string, AgentSpec>): StackIssue[] {
  const issues: StackIssue[] = [];

  stack.agents.forEach((agent, i) => {
    const seen = new Map<string, string>();
    agent.inputs.forEach((input, j) => {
      const previous = seen.get(input.name);
      if (previous !== undefined) {
        issues.push({
          code: "fan_in",
          message:
            `input ${agent.name}.${input.name} is bound to both "${previous}" and ` +
            `"${input.source}"; merging several sources into one input is not supported`,
          agents: [agent.name],
          path: `stack.agents.${i}.inputs.${j}`,
        });
      } else {
        seen.set(input.name, input.source);
      }
    });
  });

  stack.data_flow.forEach((flow, k) => {
    const path = `stack.data_flow.${k}`;
    const from = parseSourceRef(flow.from);
    const to = parseSourceRef(flow.to);

    if (from === null || from.kind !== "agent" || to === null || to.kind !== "agent") {
      issues.push({
        code: "data_flow_mismatch",
        message: `data_flow entry ${flow.from} -> ${flow.to} must use "<agent>.<name>" on both sides`,
        agents: [],
        path,
      });
      return;
    }

    const producer = byName.get(from.agent);
    if (producer === undefined || !producer.outputs.some((o) => o.name === from.output)) {
      issues.push({
        code: "data_flow_mismatch",
        message: `data_flow entry ${flow.from} -> ${flow.to} names an undeclared output ${flow.from}`,
        agents: [from.agent],
        path,
      });
      return;
    }

    const consumer = byName.get(to.agent);
    const input = consumer?.inputs.find((inp) => inp.name === to.output);
    if (consumer === undefined || input === undefined) {
      issues.push({
        code: "data_flow_mismatch",
        message: `data_flow entry ${flow.from} -> ${flow.to} names an undeclared input ${flow.to}`,
        agents: [to.agent],
        path,
      });
      return;
    }

    if (input.source !== flow.from) {
      issues.push({
        code: "fan_in",
        message:
          `input ${flow.to} is bound to "${input.source}" but a data_flow entry ` +
          `also binds it to "${flow.from}"`,
        agents: [consumer.name, producer.name],
        path,
      });
    }
  });

  return issues;
}

/** (d) The dependency graph is acyclic. */
function checkAcyclic(graph: StackGraph): StackIssue[] {
  return findCycles(graph).map((cycle): StackIssue => ({
    code: "cycle",
    message: `dependency cycle ${cycle.join(" -> ")}`,
    agents: [...new Set(cycle)],
    cycle,
  }));
}

// ── Entry points ─────────────────────────────────────────────────

/**
 * Name of the agent a shape issue sits under (`stack.agents.<i>...`),
 * read from the raw document when it declares one.
 */
function agentsAtPath(raw: unknown, issuePath: (string | number)[]): string[] {
  const [root, section, index] = issuePath;
  if (root !== "stack" || section !== "agents" || typeof index !== "number") return [];

  if (typeof raw !== "object" || raw === null || !("stack" in raw)) return [];
  const stack = raw.stack;
  if (typeof stack !== "object" || stack === null || !("agents" in stack)) return [];
  const agents = stack.agents;
  if (!Array.isArray(agents)) return [];

  const agent: unknown = agents[index];
  if (typeof agent !== "object" || agent === null || !("name" in agent)) return [];
  return typeof agent.name === "string" && agent.name !== "" ? [agent.name] : [];
}

/**
 * Validate a raw stack document (already parsed from YAML or JSON).
 */
export function validateStack(raw: unknown): ValidationResult {
  const shape = StackDocumentSchema.safeParse(raw);
  if (!shape.success) {
    const errors = zodIssuesToStackIssues(shape.error, (p) => agentsAtPath(raw, p));
    return { ok: false, errors, warnings: [] };
  }

  const stack = shape.data.stack;
  const policyResolution = resolvePolicies(stack.policies, stack.requires);
  const warnings: StackWarning[] = [...policyResolution.warnings];

  if (policyResolution.errors.some((e) => e.code === "schema")) {
    return { ok: false, errors: policyResolution.errors, warnings };
  }

  const byName = new Map<string, AgentSpec>();
  for (const agent of stack.agents) {
    if (!byName.has(agent.name)) byName.set(agent.name, agent);
  }

  const structural: StackIssue[] = [
    ...policyResolution.errors,
    ...checkNameUniqueness(stack.agents),
    ...checkOutputUniqueness(stack.agents),
    ...checkSources(stack.agents, byName, warnings),
    ...checkFanIn(stack, byName),
  ];
  if (structural.length > 0) {
    return { ok: false, errors: structural, warnings };
  }

  const parsed: ParsedStack = {
    name: stack.name,
    agents: stack.agents,
    dataFlow: stack.data_flow,
    policies: policyResolution.policies,
  };
  const graph = buildStackGraph(parsed);

  const cycles = checkAcyclic(graph);
  if (cycles.length > 0) {
    return { ok: false, errors: cycles, warnings };
  }

  return { ok: true, graph, warnings };
}

/**
 * Validate and return the graph, or throw.
 *
 * @throws PolicyConflictError  — every error is a policy conflict
 * @throws StackValidationError — any other validation failure
 */
export function assertValidStack(
  raw: unknown,
  source = "stack declaration",
): { graph: StackGraph; warnings: StackWarning[] } {
  const result = validateStack(raw);
  if (result.ok) {
    return { graph: result.graph, warnings: result.warnings };
  }

  if (result.errors.every((e) => e.code === "policy_conflict")) {
    const policies = result.errors.flatMap((e) => (e.policy === undefined ? [] : [e.policy]));
    throw new PolicyConflictError(policies, result.errors);
  }
  throw new StackValidationError(source, result.errors);
}
