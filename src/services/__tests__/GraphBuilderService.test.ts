/**
 * GraphBuilderService.test.ts
 *
 * Run with:
 *   node --import tsx --test src/services/__tests__/GraphBuilderService.test.ts
 */

import { test } from "node:test";
import assert from "node:assert/strict";
import {
  agentFingerprint,
  buildStackGraph,
  downstreamOf,
  findCycles,
  formatSourceRef,
  parseSourceRef,
} from "../GraphBuilderService.js";
import { UnknownReferenceError } from "../../errors/index.js";
import { DEFAULT_POLICIES } from "../../types/index.js";
import type { ParsedStack } from "../../types/index.js";
import { cycleAgents, makeSpec } from "../../testing/fixtures.js";
import type { RawAgent } from "../../testing/fixtures.js";

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

function makeParsed(agents: RawAgent[], overrides: Partial<ParsedStack> = {}): ParsedStack {
  return {
    name: "graph-test",
    agents: agents.map(makeSpec),
    dataFlow: [],
    policies: { ...DEFAULT_POLICIES },
    ...overrides,
  };
}

/** A feeds B and C; D reads both B and C; E reads an external source. */
function diamond(): RawAgent[] {
  return [
    { name: "A", outputs: [{ name: "x" }] },
    { name: "B", inputs: [{ name: "a", source: "A.x" }], outputs: [{ name: "y" }] },
    { name: "C", inputs: [{ name: "a", source: "A.x" }], outputs: [{ name: "z" }] },
    {
      name: "D",
      inputs: [
        { name: "b", source: "B.y" },
        { name: "c", source: "C.z" },
      ],
    },
    { name: "E", inputs: [{ name: "seed", source: "external:seed" }] },
  ];
}

// ---------------------------------------------------------------------------
// Source references
// ---------------------------------------------------------------------------

// Test 1 — Both source forms parse; everything else is null
test("Test 1 — parseSourceRef recognizes agent and external sources", () => {
  assert.deepEqual(parseSourceRef("loader.docs"), { kind: "agent", agent: "loader", output: "docs" });
  assert.deepEqual(parseSourceRef("loader.docs.v2"), {
    kind: "agent",
    agent: "loader",
    output: "docs.v2",
  });
  assert.deepEqual(parseSourceRef("external:workspace_context"), {
    kind: "external",
    id: "workspace_context",
  });
  assert.equal(parseSourceRef("loader"), null);
  assert.equal(parseSourceRef(".docs"), null);
  assert.equal(parseSourceRef("external:"), null);
});

// Test 2 — formatSourceRef inverts parseSourceRef
test("Test 2 — formatSourceRef renders both forms", () => {
  assert.equal(formatSourceRef({ kind: "agent", agent: "A", output: "x" }), "A.x");
  assert.equal(formatSourceRef({ kind: "external", id: "seed" }), "external:seed");
});

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

// Test 3 — Edges follow consumer order, then input order
test("Test 3 — edges are derived from inputs in declaration order", () => {
  const graph = buildStackGraph(makeParsed(diamond()));
  assert.deepEqual(
    graph.edges.map((e) => [e.producer, e.output, e.consumer, e.input]),
    [
      ["A", "x", "B", "a"],
      ["A", "x", "C", "a"],
      ["B", "y", "D", "b"],
      ["C", "z", "D", "c"],
    ],
  );
});

// Test 4 — Adjacency in both directions, indexed by declaration position
test("Test 4 — adjacency lists are materialized both ways", () => {
  const graph = buildStackGraph(makeParsed(diamond()));
  assert.deepEqual(graph.consumersOf, [[1, 2], [3], [3], [], []]);
  assert.deepEqual(graph.producersOf, [[], [0], [0], [1, 2], []]);
  assert.deepEqual([...graph.externalConsumers.entries()], [["seed", [4]]]);
  assert.equal(graph.indexOf.get("D"), 3);
});

// Test 5 — Two inputs from one producer give two edges but one neighbour
test("Test 5 — repeated producer appears once in adjacency", () => {
  const graph = buildStackGraph(
    makeParsed([
      { name: "A", outputs: [{ name: "x" }, { name: "y" }] },
      {
        name: "B",
        inputs: [
          { name: "first", source: "A.x" },
          { name: "second", source: "A.y" },
        ],
      },
    ]),
  );
  assert.equal(graph.edges.length, 2);
  assert.deepEqual(graph.consumersOf[0], [1]);
  assert.deepEqual(graph.producersOf[1], [0]);
});

// Test 6 — Transform hints from data_flow are attached to their edge
test("Test 6 — data_flow transforms annotate matching edges", () => {
  const graph = buildStackGraph(
    makeParsed(diamond(), {
      dataFlow: [{ from: "A.x", to: "C.a", transform: "summarize" }],
    }),
  );
  assert.deepEqual(
    graph.edges.map((e) => e.transform),
    [null, "summarize", null, null],
  );
});

// Test 7 — Unvalidated input naming an unknown agent
test("Test 7 — unknown producer throws UnknownReferenceError", () => {
  assert.throws(
    () => buildStackGraph(makeParsed([{ name: "B", inputs: [{ name: "a", source: "ghost.x" }] }])),
    (err: unknown) => err instanceof UnknownReferenceError && err.references.join() === "ghost",
  );
});

// Test 8 — Fingerprints are content hashes
test("Test 8 — fingerprints change with content only", () => {
  const first = buildStackGraph(makeParsed(diamond()));
  const second = buildStackGraph(makeParsed(diamond()));
  assert.equal(first.fingerprint, second.fingerprint);
  assert.match(first.fingerprint, /^[0-9a-f]{64}$/);

  const changed = diamond();
  changed[1] = { ...changed[1], description: "now documented" };
  assert.notEqual(buildStackGraph(makeParsed(changed)).fingerprint, first.fingerprint);
  assert.notEqual(agentFingerprint(makeSpec(changed[1])), agentFingerprint(makeSpec(diamond()[1])));

  const withPolicy = buildStackGraph(
    makeParsed(diamond(), { policies: { ...DEFAULT_POLICIES, parallel_init: true } }),
  );
  assert.notEqual(withPolicy.fingerprint, first.fingerprint);
});

// ---------------------------------------------------------------------------
// Traversals
// ---------------------------------------------------------------------------

// Test 9 — Forward reachability excludes unreached starts
test("Test 9 — downstreamOf returns reachable consumers", () => {
  const graph = buildStackGraph(makeParsed(diamond()));
  assert.deepEqual([...downstreamOf(graph, [0])].sort(), [1, 2, 3]);
  assert.deepEqual([...downstreamOf(graph, [1])], [3]);
  assert.deepEqual([...downstreamOf(graph, [4])], []);
  assert.deepEqual([...downstreamOf(graph, [0, 1])].sort(), [1, 2, 3]);
});

// Test 10 — Cycle search on an acyclic graph
test("Test 10 — findCycles is empty for a DAG", () => {
  assert.deepEqual(findCycles(buildStackGraph(makeParsed(diamond()))), []);
});

// Test 11 — Cycle search reports each cycle once, in dependency order
test("Test 11 — findCycles reports closed paths once", () => {
  const agents = cycleAgents();
  agents.push(
    { name: "P", inputs: [{ name: "q", source: "Q.out" }], outputs: [{ name: "out" }] },
    { name: "Q", inputs: [{ name: "p", source: "P.out" }], outputs: [{ name: "out" }] },
  );
  assert.deepEqual(findCycles(buildStackGraph(makeParsed(agents))), [
    ["A", "B", "C", "A"],
    ["P", "Q", "P"],
  ]);
});
