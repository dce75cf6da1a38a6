import { describe, expect, test } from "vitest";

import {
  StructuralIntegrityError,
  TopologyIndex,
  createGraphNode,
  temporalPoint,
  withBranchTarget,
  withConsensus,
  withLeaf,
  withMergeSource,
} from "../src/index.js";
import type { GraphNode, NodeKind } from "../src/index.js";

function mk(id: string, t: number, parentId?: string, opts: { authorId?: string; kind?: NodeKind } = {}): GraphNode {
  const authorId = opts.authorId ?? "alice";
  return createGraphNode({
    id,
    roomId: "room-1",
    authorId,
    ...(parentId !== undefined ? { parentId } : {}),
    content: id,
    ...(opts.kind !== undefined ? { kind: opts.kind } : {}),
    position: temporalPoint({ timestamp: t, author: authorId, authorLane: 0, totalLanes: 3, threadDepth: 0 }),
    logicalClock: 1,
  });
}

const ids = (nodes: readonly GraphNode[]) => nodes.map((n) => n.id);

//  r ─┬─ a ─┬─ a2
//     │     └─ a1
//     └─ b ─── b1
//  x
const tree = [
  mk("r", 0),
  mk("a", 1_000, "r"),
  mk("a1", 3_000, "a"),
  mk("a2", 2_000, "a"),
  mk("b", 1_000, "r", { authorId: "bob" }),
  mk("b1", 4_000, "b", { authorId: "bob" }),
  mk("x", 500),
];

describe("structural queries", () => {
  const index = TopologyIndex.fromNodes(tree);

  test("lookups", () => {
    expect(index.size).toBe(7);
    expect(index.getNode("a")?.content).toBe("a");
    expect(index.getNode("nope")).toBeUndefined();
    expect(index.getParent("a1")?.id).toBe("a");
    expect(index.getParent("r")).toBeUndefined();
  });

  test("children are ordered by creation time, then id", () => {
    expect(ids(index.getChildren("r"))).toEqual(["a", "b"]);
    expect(ids(index.getChildren("a"))).toEqual(["a2", "a1"]);
    expect(index.getChildren("b1")).toEqual([]);
  });

  test("ancestors, depth and path to root", () => {
    expect(ids(index.getAncestors("a1"))).toEqual(["a", "r"]);
    expect(index.getAncestors("r")).toEqual([]);
    expect(index.getAncestors("nope")).toEqual([]);
    expect(index.getDepth("b1")).toBe(2);
    expect(ids(index.getPathToRoot("a1"))).toEqual(["a1", "a", "r"]);
  });

  test("descendants come depth-first in pre-order", () => {
    expect(ids(index.getDescendants("r"))).toEqual(["a", "a2", "a1", "b", "b1"]);
    expect(index.getDescendants("x")).toEqual([]);
  });

  test("common ancestor", () => {
    expect(index.getCommonAncestor("a1", "b1")?.id).toBe("r");
    expect(index.getCommonAncestor("a1", "a2")?.id).toBe("a");
    expect(index.getCommonAncestor("a1", "a")?.id).toBe("a");
    expect(index.getCommonAncestor("a1", "x")).toBeUndefined();
    expect(index.getCommonAncestor("a1", "nope")).toBeUndefined();
  });

  test("roots, time ranges and authors", () => {
    expect(ids(index.getRoots())).toEqual(["r", "x"]);
    expect(ids(index.getNodesInTimeRange(0, 2_000))).toEqual(["x", "a", "b"]);
    expect(ids(index.getAuthorNodes("bob"))).toEqual(["b", "b1"]);
  });
});

test("rebuilding from the same nodes in any order answers identically", () => {
  const forward = TopologyIndex.fromNodes(tree);
  const backward = TopologyIndex.fromNodes([...tree].reverse());
  const all = ids(tree);

  for (const a of all) {
    expect(ids(backward.getAncestors(a))).toEqual(ids(forward.getAncestors(a)));
    expect(ids(backward.getDescendants(a))).toEqual(ids(forward.getDescendants(a)));
    expect(ids(backward.getChildren(a))).toEqual(ids(forward.getChildren(a)));
    for (const b of all) {
      expect(backward.getCommonAncestor(a, b)?.id).toBe(forward.getCommonAncestor(a, b)?.id);
    }
  }
});

test("incremental maintenance relinks moved nodes and forgets removed ones", () => {
  const index = TopologyIndex.fromNodes(tree);
  const moved = index.getNode("a2");
  if (!moved) throw new Error("missing a2");

  index.upsert({ ...moved, parentId: "b" });
  expect(ids(index.getChildren("a"))).toEqual(["a1"]);
  expect(ids(index.getChildren("b"))).toEqual(["a2", "b1"]);

  expect(index.remove("b1")).toBe(true);
  expect(index.remove("b1")).toBe(false);
  expect(ids(index.getChildren("b"))).toEqual(["a2"]);
  expect(index.size).toBe(6);
});

test("children that arrive before their parent attach once it does", () => {
  const index = TopologyIndex.fromNodes([mk("child", 2_000, "late")]);
  expect(index.getAncestors("child")).toEqual([]);

  index.upsert(mk("late", 1_000));
  expect(ids(index.getAncestors("child"))).toEqual(["late"]);
  expect(ids(index.getChildren("late"))).toEqual(["child"]);
});

test("a cyclic parent chain raises a structural error with the chain", () => {
  const index = TopologyIndex.fromNodes([mk("c1", 1_000, "c2"), mk("c2", 2_000, "c1")]);

  let caught: unknown;
  try {
    index.getAncestors("c1");
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(StructuralIntegrityError);
  expect(caught).toMatchObject({ chain: ["c1", "c2", "c1"], message: "cyclic parent chain: c1 -> c2 -> c1" });
  expect(() => index.getDescendants("c1")).toThrow(StructuralIntegrityError);
});

test("branch subtrees, merge sources and edges", () => {
  const index = TopologyIndex.fromNodes([
    mk("r", 0),
    withBranchTarget(mk("a", 1_000, "r"), "b", 1_000),
    withMergeSource(mk("b", 2_000, "r"), "a", 2_000),
    mk("m", 3_000, "b", { kind: "milestone" }),
    withMergeSource(mk("ghost-merge", 4_000), "ghost", 4_000),
  ]);

  expect(ids(index.getBranchSubtree("a"))).toEqual(["b", "m"]);
  expect(index.getBranchSubtree("r")).toEqual([]);
  expect(index.getMergeSource("b")?.id).toBe("a");
  expect(index.getMergeSource("m")).toBeUndefined();
  expect(() => index.getMergeSource("ghost-merge")).toThrow("dangling merge source: ghost -> ghost-merge");
  expect(index.getEdges()).toEqual([
    { from: "r", to: "a", kind: "temporal" },
    { from: "a", to: "b", kind: "branch" },
    { from: "r", to: "b", kind: "temporal" },
    { from: "a", to: "b", kind: "merge" },
    { from: "b", to: "m", kind: "temporal" },
    { from: "ghost", to: "ghost-merge", kind: "merge" },
  ]);
});

test("metrics", () => {
  const index = TopologyIndex.fromNodes([
    mk("r", 0),
    withBranchTarget(mk("a", 1_000, "r"), "b", 1_000),
    withMergeSource(mk("b", 2_000, "r"), "a", 2_000),
    mk("m", 3_000, "b", { kind: "milestone" }),
  ]);

  expect(index.calculateMetrics()).toEqual({
    totalNodes: 4,
    totalBranches: 1,
    totalMerges: 1,
    totalMilestones: 1,
    averageDepth: 1,
    branchingFactor: 0.25,
    mergeRate: 0.25,
    convergenceScore: 1,
  });
  expect(new TopologyIndex().calculateMetrics()).toEqual({
    totalNodes: 0,
    totalBranches: 0,
    totalMerges: 0,
    totalMilestones: 0,
    averageDepth: 0,
    branchingFactor: 0,
    mergeRate: 0,
    convergenceScore: 1,
  });
});

test("contributions per participant", () => {
  const question = { ...mk("q", 1_000), content: "where next?" };
  const north = { ...mk("r1", 4_000, "q", { authorId: "bob" }), content: "north" };
  const reply = { ...mk("r2", 6_000, "q", { authorId: "bob", kind: "merge" }), content: "both" };
  let both = withMergeSource(reply, "r1", 6_000);
  both = withConsensus(both, ["alice", "bob"]);
  both = withLeaf(both, {
    id: "leaf-1",
    kind: "decision",
    title: "Route",
    content: "go both ways",
    relevance: 0.5,
    generatedAt: 7_000,
    todos: [
      { text: "pack", done: false },
      { text: "leave", done: false },
    ],
  });
  const done = { ...mk("m", 9_000, undefined, { authorId: "bob", kind: "milestone" }), content: "done" };
  const index = TopologyIndex.fromNodes([question, north, both, done]);

  expect(index.calculateContributions("bob")).toEqual({
    authorId: "bob",
    messageCount: 3,
    characterCount: 13,
    influence: 17.5,
    consensusParticipations: 1,
    decisions: 2,
    todoItems: 2,
    branchPoints: 0,
    mergePoints: 1,
    activeMs: 5_000,
    averageResponseMs: 4_000,
  });
  expect(index.calculateContributions("alice")).toMatchObject({
    messageCount: 1,
    characterCount: 11,
    influence: 10,
    consensusParticipations: 1,
    activeMs: 0,
    averageResponseMs: 0,
  });
  expect(index.calculateContributions("carol")).toMatchObject({ messageCount: 0, influence: 0, activeMs: 0 });
});
