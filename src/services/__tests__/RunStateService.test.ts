/**
 * RunStateService.test.ts
 *
 * Run with:
 *   node --import tsx --test src/services/__tests__/RunStateService.test.ts
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  canTransition,
  createRunState,
  markDirty,
  reconcileRunState,
  transitionAgent,
  updateAgent,
} from "../RunStateService.js";
import { computeExecutionPlan } from "../ExecutionPlannerService.js";
import { IllegalTransitionError, UnknownReferenceError } from "../../errors/index.js";
import type { RunState, StackGraph } from "../../types/index.js";
import { chainAgents, makeGraph } from "../../testing/fixtures.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const graph = makeGraph(chainAgents());
const plan = computeExecutionPlan(graph);

/** State in which every agent of `g` succeeded with `{ n: <index> }`. */
function allSucceeded(g: StackGraph): RunState {
  let state = createRunState(g, computeExecutionPlan(g));
  g.agents.forEach((spec, i) => {
    state = transitionAgent(state, spec.name, "running", { attempts: 1 });
    state = transitionAgent(state, spec.name, "succeeded", { last_output_value: { n: i } });
  });
  return state;
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

// Test 1 — Initial state
test("Test 1 — createRunState starts every agent pending", () => {
  const state = createRunState(graph, plan);
  assert.equal(state.plan_version, plan.version);
  assert.deepEqual(Object.keys(state.agents), ["A", "B", "C"]);
  assert.deepEqual(
    { ...state.agents["A"], spec_fingerprint: "" },
    {
      status: "pending",
      last_output_value: null,
      last_run_timestamp: null,
      attempts: 0,
      error: null,
      spec_fingerprint: "",
    },
  );
});

// Test 2 — Allowed and forbidden moves
test("Test 2 — canTransition follows the agent state machine", () => {
  assert.equal(canTransition("pending", "running"), true);
  assert.equal(canTransition("running", "succeeded"), true);
  assert.equal(canTransition("succeeded", "stale"), true);
  assert.equal(canTransition("stale", "running"), true);
  assert.equal(canTransition("failed", "pending"), true);
  assert.equal(canTransition("pending", "succeeded"), false);
  assert.equal(canTransition("running", "running"), false);
  assert.equal(canTransition("succeeded", "running"), false);
});

// Test 3 — transitionAgent returns a new state
test("Test 3 — transitionAgent never mutates its input", () => {
  const before = createRunState(graph, plan);
  const after = transitionAgent(before, "A", "running", { attempts: 1 });
  assert.equal(before.agents["A"].status, "pending");
  assert.equal(after.agents["A"].status, "running");
  assert.equal(after.agents["A"].attempts, 1);
  assert.equal(after.agents["B"], before.agents["B"]);
});

// Test 4 — Illegal moves and unknown agents
test("Test 4 — illegal moves and unknown agents throw", () => {
  const state = createRunState(graph, plan);
  assert.throws(
    () => transitionAgent(state, "A", "succeeded"),
    (err: unknown) =>
      err instanceof IllegalTransitionError && err.from === "pending" && err.to === "succeeded",
  );
  assert.throws(() => transitionAgent(state, "ghost", "running"), UnknownReferenceError);
  assert.throws(() => updateAgent(state, "ghost", { attempts: 2 }), UnknownReferenceError);
});

// Test 5 — markDirty
test("Test 5 — markDirty makes succeeded stale and re-queues failed", () => {
  let state = allSucceeded(graph);
  state = transitionAgent(state, "C", "stale");
  state = transitionAgent(state, "C", "failed", { error: "boom" });

  const result = markDirty(state, ["A", "B", "C"]);
  assert.deepEqual(result.marked, ["A", "B", "C"]);
  assert.equal(result.state.agents["A"].status, "stale");
  assert.deepEqual(result.state.agents["A"].last_output_value, { n: 0 });
  assert.equal(result.state.agents["C"].status, "pending");
  assert.equal(result.state.agents["C"].error, null);

  const again = markDirty(result.state, ["A", "C"]);
  assert.deepEqual(again.marked, []);
});

// Test 6 — Reconcile against an unchanged graph
test("Test 6 — reconcile with no changes keeps every status", () => {
  const result = reconcileRunState(allSucceeded(graph), graph, plan);
  assert.deepEqual(result.changed, []);
  assert.deepEqual(result.invalidated, []);
  assert.deepEqual(
    Object.values(result.state.agents).map((a) => a.status),
    ["succeeded", "succeeded", "succeeded"],
  );
});

// Test 7 — A changed declaration invalidates itself and its downstream
test("Test 7 — reconcile invalidates a changed agent and its dependents", () => {
  const agents = chainAgents();
  agents[1] = { ...agents[1], description: "reworded" };
  const next = makeGraph(agents);
  const nextPlan = computeExecutionPlan(next);

  const result = reconcileRunState(allSucceeded(graph), next, nextPlan);
  assert.deepEqual(result.changed, ["B"]);
  assert.deepEqual(result.invalidated, ["B", "C"]);
  assert.equal(result.state.plan_version, nextPlan.version);
  assert.equal(result.state.agents["A"].status, "succeeded");
  assert.equal(result.state.agents["B"].status, "stale");
  assert.equal(result.state.agents["C"].status, "stale");
});

// Test 8 — Added, removed and interrupted agents
test("Test 8 — reconcile handles added, removed and interrupted agents", () => {
  let previous = allSucceeded(graph);
  previous = transitionAgent(previous, "C", "stale");
  previous = transitionAgent(previous, "C", "running");

  const next = makeGraph([
    ...chainAgents().slice(0, 2),
    { name: "D", inputs: [{ name: "b", source: "B.y" }] },
  ]);
  const result = reconcileRunState(previous, next, computeExecutionPlan(next));

  assert.deepEqual(result.added, ["D"]);
  assert.deepEqual(result.removed, ["C"]);
  assert.deepEqual(Object.keys(result.state.agents), ["A", "B", "D"]);
  assert.equal(result.state.agents["D"].status, "pending");

  const interrupted = reconcileRunState(previous, graph, plan);
  assert.equal(interrupted.state.agents["C"].status, "pending");
});
