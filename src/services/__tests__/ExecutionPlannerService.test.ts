/**
 * ExecutionPlannerService.test.ts
 *
 * Run with:
 *   node --import tsx --test src/services/__tests__/ExecutionPlannerService.test.ts
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import { computeExecutionPlan, planVersion, tierIndex } from "../ExecutionPlannerService.js";
import { buildStackGraph } from "../GraphBuilderService.js";
import { CycleError, UnknownReferenceError } from "../../errors/index.js";
import { DEFAULT_POLICIES } from "../../types/index.js";
import type { StackGraph } from "../../types/index.js";
import { chainAgents, cycleAgents, makeGraph, makeSpec } from "../../testing/fixtures.js";
import type { RawAgent } from "../../testing/fixtures.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

/** Builds without validation, so cyclic graphs reach the planner. */
function buildUnchecked(agents: RawAgent[]): StackGraph {
  return buildStackGraph({
    name: "unchecked",
    agents: agents.map(makeSpec),
    dataFlow: [],
    policies: { ...DEFAULT_POLICIES },
  });
}

/** Every dependency of an agent sits in a strictly earlier tier. */
function assertTierOrder(graph: StackGraph, tiers: readonly (readonly string[])[]): void {
  const tierOf = new Map<string, number>();
  tiers.forEach((tier, t) => tier.forEach((name) => tierOf.set(name, t)));
  for (const edge of graph.edges) {
    const producer = tierOf.get(edge.producer) ?? -1;
    const consumer = tierOf.get(edge.consumer) ?? -1;
    assert.ok(producer < consumer, `${edge.producer} must precede ${edge.consumer}`);
  }
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

// Test 1 — Independent producers share the first tier
test("Test 1 — C after A and B, whatever the declaration order", () => {
  const graph = makeGraph([
    {
      name: "C",
      inputs: [
        { name: "a", source: "A.x" },
        { name: "b", source: "B.y" },
      ],
    },
    { name: "A", inputs: [{ name: "seed", source: "external:seed" }], outputs: [{ name: "x" }] },
    { name: "B", inputs: [{ name: "seed", source: "external:seed" }], outputs: [{ name: "y" }] },
  ]);
  const plan = computeExecutionPlan(graph);
  assert.deepEqual(plan.tiers, [["A", "B"], ["C"]]);
  assertTierOrder(graph, plan.tiers);
});

// Test 2 — A chain gives one agent per tier
test("Test 2 — a chain yields one tier per agent", () => {
  const plan = computeExecutionPlan(makeGraph(chainAgents()));
  assert.deepEqual(plan.tiers, [["A"], ["B"], ["C"]]);
  assert.equal(plan.stack, "test-stack");
});

// Test 3 — Diamond
test("Test 3 — a diamond yields three tiers", () => {
  const graph = makeGraph([
    { name: "A", outputs: [{ name: "x" }] },
    { name: "C", inputs: [{ name: "a", source: "A.x" }], outputs: [{ name: "z" }] },
    { name: "B", inputs: [{ name: "a", source: "A.x" }], outputs: [{ name: "y" }] },
    {
      name: "D",
      inputs: [
        { name: "b", source: "B.y" },
        { name: "c", source: "C.z" },
      ],
    },
  ]);
  const plan = computeExecutionPlan(graph);
  assert.deepEqual(plan.tiers, [["A"], ["C", "B"], ["D"]]);
  assertTierOrder(graph, plan.tiers);
});

// Test 4 — Agents without dependencies all land in tier 1
test("Test 4 — independent agents form a single tier", () => {
  const plan = computeExecutionPlan(
    makeGraph([{ name: "one" }, { name: "two" }, { name: "three" }]),
  );
  assert.deepEqual(plan.tiers, [["one", "two", "three"]]);
});

// Test 5 — Determinism and immutability
test("Test 5 — identical graphs give identical, frozen plans", () => {
  const first = computeExecutionPlan(makeGraph(chainAgents()));
  const second = computeExecutionPlan(makeGraph(chainAgents()));
  assert.deepEqual(first, second);
  assert.ok(Object.isFrozen(first));
  assert.ok(Object.isFrozen(first.tiers));
  assert.ok(Object.isFrozen(first.tiers[0]));
});

// Test 6 — Version derives from the graph fingerprint
test("Test 6 — plan version is the fingerprint prefix", () => {
  const graph = makeGraph(chainAgents());
  const plan = computeExecutionPlan(graph);
  assert.equal(plan.version, graph.fingerprint.slice(0, 12));
  assert.equal(planVersion(graph), plan.version);

  const withCascade = makeGraph(chainAgents(), { policies: { cascade_stop: true } });
  assert.notEqual(computeExecutionPlan(withCascade).version, plan.version);
});

// Test 7 — Cycles that bypassed validation
test("Test 7 — a cyclic graph throws CycleError with the cycle path", () => {
  const agents = cycleAgents();
  agents.unshift({ name: "free" });
  assert.throws(
    () => computeExecutionPlan(buildUnchecked(agents)),
    (err: unknown) => {
      assert.ok(err instanceof CycleError);
      assert.deepEqual(err.cycle, ["A", "B", "C", "A"]);
      assert.deepEqual(err.agents, ["A", "B", "C"]);
      return true;
    },
  );
});

// Test 8 — Edges naming agents the graph does not hold
test("Test 8 — a hand-built graph with a dangling edge throws UnknownReferenceError", () => {
  const graph = makeGraph(chainAgents());
  const tampered: StackGraph = {
    ...graph,
    edges: [
      ...graph.edges,
      { producer: "ghost", output: "x", consumer: "C", input: "g", transform: null },
    ],
  };
  assert.throws(
    () => computeExecutionPlan(tampered),
    (err: unknown) => err instanceof UnknownReferenceError && err.references.join() === "ghost",
  );
});

// Test 9 — Adjacency that was never materialized
test("Test 9 — a graph without adjacency throws UnknownReferenceError", () => {
  const graph = makeGraph(chainAgents());
  assert.throws(
    () => computeExecutionPlan({ ...graph, consumersOf: [], producersOf: [] }),
    UnknownReferenceError,
  );
});

// Test 10 — Tier lookup
test("Test 10 — tierIndex maps each agent to its tier", () => {
  const index = tierIndex(computeExecutionPlan(makeGraph(chainAgents())));
  assert.deepEqual([...index.entries()], [
    ["A", 0],
    ["B", 1],
    ["C", 2],
  ]);
});
