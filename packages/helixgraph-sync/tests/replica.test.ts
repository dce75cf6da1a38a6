import { describe, expect, test } from "vitest";

import { applyEventToState, emptyReplicaState, isWithinTolerance } from "../src/replica.js";
import type { ReplicaState, SyncEvent } from "../src/types.js";
import { ROOM, created, deleted, makeLeaf, makeNode, updated } from "./helpers.js";

function applyAll(events: readonly SyncEvent[], state: ReplicaState = emptyReplicaState(ROOM)): ReplicaState {
  return events.reduce((acc, event) => applyEventToState(acc, event).state, state);
}

describe("idempotent replay", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const edited = { ...node, content: "edited", updatedAt: 2_000 };

  const cases: [string, SyncEvent[]][] = [
    ["create", [created(node)]],
    ["update", [created(node), updated(edited, "bob", 1)]],
    ["delete", [created(node), deleted("n-1", "bob", 1, 3_000)]],
  ];

  for (const [name, events] of cases) {
    test(`applying a ${name} twice equals applying it once`, () => {
      const once = applyAll(events);
      const last = events[events.length - 1];
      if (!last) throw new Error("no events");
      const twice = applyEventToState(once, last).state;
      expect(twice).toEqual(once);
    });
  }
});

test("applied events merge clocks and advance lastUpdate", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 5_000 });
  const event: SyncEvent = { ...created(node), vectorClock: { alice: 4, bob: 2 } };
  const state = applyAll([event], { ...emptyReplicaState(ROOM), vectorClock: { alice: 1, carol: 7 }, lastUpdate: 9_000 });

  expect(state.vectorClock).toEqual({ alice: 4, bob: 2, carol: 7 });
  expect(state.lastUpdate).toBe(9_000);
});

test("a deleted node stays deleted when its create arrives late", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const state = applyAll([deleted("n-1", "bob", 1, 2_000)]);
  const result = applyEventToState(state, created(node));

  expect(result).toMatchObject({ outcome: "ignored", reason: "tombstoned" });
  expect(result.state.nodes.has("n-1")).toBe(false);
  expect(result.state.tombstones.has("n-1")).toBe(true);
});

test("an older version of a node does not replace a newer one", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const newer = { ...node, content: "newer", updatedAt: 3_000 };
  const older = { ...node, content: "older", updatedAt: 2_000 };
  const state = applyAll([created(node), updated(newer, "bob", 1)]);

  const result = applyEventToState(state, updated(older, "carol", 1));
  expect(result).toMatchObject({ outcome: "ignored", reason: "superseded" });
  expect(result.state.nodes.get("n-1")?.content).toBe("newer");
});

test("equal updatedAt is broken by the writing author", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const fromBob = { ...node, content: "bob", updatedAt: 2_000 };
  const fromCarol = { ...node, content: "carol", updatedAt: 2_000 };

  const a = applyAll([created(node), updated(fromBob, "bob", 1), updated(fromCarol, "carol", 1)]);
  const b = applyAll([created(node), updated(fromCarol, "carol", 1), updated(fromBob, "bob", 1)]);

  expect(a.nodes.get("n-1")?.content).toBe("carol");
  expect(b.nodes).toEqual(a.nodes);
  expect(b.writers.get("n-1")).toBe("carol");
});

test("leaves append without duplicates and need their node", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const leafEvent = (leafId: string, counter: number): SyncEvent => ({
    kind: "leafGenerated",
    roomId: ROOM,
    authorId: "bob",
    payload: { nodeId: "n-1", leaf: makeLeaf(leafId) },
    vectorClock: { bob: counter },
    timestamp: 2_000,
  });

  const orphan = applyEventToState(emptyReplicaState(ROOM), leafEvent("leaf-1", 1));
  expect(orphan).toMatchObject({ outcome: "ignored", reason: "missing" });

  const state = applyAll([created(node), leafEvent("leaf-1", 1), leafEvent("leaf-2", 2), leafEvent("leaf-1", 3)]);
  expect(state.nodes.get("n-1")?.leaves.map((leaf) => leaf.id)).toEqual(["leaf-1", "leaf-2"]);
});

test("consensus confirms the node and records sorted participants as a field update", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const state = applyAll([
    created(node),
    {
      kind: "consensusFormed",
      roomId: ROOM,
      authorId: "bob",
      payload: { nodeId: "n-1", participantIds: ["carol", "alice", "carol"] },
      vectorClock: { bob: 1 },
      timestamp: 4_000,
    },
  ]);

  const confirmed = state.nodes.get("n-1");
  expect(confirmed?.status).toBe("confirmed");
  expect(confirmed?.consensus).toEqual(["alice", "carol"]);
  expect(confirmed?.updatedAt).toBe(1_000);
  expect(state.writers.get("n-1")).toBe("alice");
});

describe("field updates survive concurrent whole-node versions", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const leafEvent: SyncEvent = {
    kind: "leafGenerated",
    roomId: ROOM,
    authorId: "alice",
    payload: { nodeId: "n-1", leaf: makeLeaf("leaf-a") },
    vectorClock: { alice: 2 },
    timestamp: 2_000,
  };
  const consensusEvent: SyncEvent = {
    kind: "consensusFormed",
    roomId: ROOM,
    authorId: "carol",
    payload: { nodeId: "n-1", participantIds: ["alice", "carol"] },
    vectorClock: { carol: 1 },
    timestamp: 2_500,
  };
  const resolvedEvent: SyncEvent = {
    kind: "contentionResolved",
    roomId: ROOM,
    authorId: "carol",
    payload: { nodeId: "n-1", resolution: "keep both" },
    vectorClock: { carol: 2 },
    timestamp: 2_600,
  };
  // Bob edits a copy that has seen none of the above.
  const edit = updated({ ...node, content: "edited by bob", updatedAt: 3_000 }, "bob", 1);

  const orders: [string, SyncEvent[]][] = [
    ["field updates first", [created(node), leafEvent, consensusEvent, resolvedEvent, edit]],
    ["edit first", [created(node), edit, leafEvent, consensusEvent, resolvedEvent]],
    ["interleaved", [created(node), consensusEvent, edit, resolvedEvent, leafEvent]],
  ];

  for (const [name, events] of orders) {
    test(name, () => {
      const held = applyAll(events).nodes.get("n-1");
      expect(held?.content).toBe("edited by bob");
      expect(held?.updatedAt).toBe(3_000);
      expect(held?.leaves.map((leaf) => leaf.id)).toEqual(["leaf-a"]);
      expect(held?.consensus).toEqual(["alice", "carol"]);
      expect(held?.status).toBe("confirmed");
      expect(held?.resolution).toEqual({ text: "keep both", resolvedBy: "carol", resolvedAt: 2_600 });
    });
  }

  test("a losing version still contributes its leaves", () => {
    const stale = updated({ ...node, content: "stale", updatedAt: 2_000, leaves: [makeLeaf("leaf-b")] }, "carol", 3);
    const result = applyEventToState(applyAll([created(node), edit]), stale);
    expect(result.outcome).toBe("applied");
    expect(result.state.nodes.get("n-1")?.content).toBe("edited by bob");
    expect(result.state.nodes.get("n-1")?.leaves.map((leaf) => leaf.id)).toEqual(["leaf-b"]);
    expect(result.state.writers.get("n-1")).toBe("bob");
  });
});

test("avatar events only touch avatars", () => {
  const node = makeNode({ id: "n-1", authorId: "alice", timestamp: 1_000 });
  const state = applyAll([
    created(node),
    {
      kind: "participantJoined",
      roomId: ROOM,
      authorId: "bob",
      payload: {
        avatar: { id: "bob", name: "Bob", position: { x: 0, y: 0, z: 0 }, state: "idle", energy: 0.5, lastUpdate: 1_500 },
      },
      vectorClock: { bob: 1 },
      timestamp: 1_500,
    },
    {
      kind: "avatarMoved",
      roomId: ROOM,
      authorId: "bob",
      payload: { avatarId: "bob", position: { x: 4, y: 5, z: 6 } },
      vectorClock: { bob: 2 },
      timestamp: 1_600,
    },
    {
      kind: "avatarStateChanged",
      roomId: ROOM,
      authorId: "bob",
      payload: { avatarId: "bob", state: "flying", energy: 0.9 },
      vectorClock: { bob: 3 },
      timestamp: 1_700,
    },
  ]);

  expect(state.avatars.get("bob")).toEqual({
    id: "bob",
    name: "Bob",
    position: { x: 4, y: 5, z: 6 },
    state: "flying",
    energy: 0.9,
    lastUpdate: 1_700,
  });
  expect(state.nodes.get("n-1")).toBe(node);

  const gone = applyAll(
    [
      {
        kind: "participantLeft",
        roomId: ROOM,
        authorId: "bob",
        payload: { avatarId: "bob" },
        vectorClock: { bob: 4 },
        timestamp: 1_800,
      },
    ],
    state
  );
  expect(gone.avatars.size).toBe(0);
});

test("tolerance window accepts newer events and ones at most toleranceMs behind", () => {
  const state = { ...emptyReplicaState(ROOM), lastUpdate: 10_000 };
  expect(isWithinTolerance(state, 10_001, 2_000)).toBe(true);
  expect(isWithinTolerance(state, 8_000, 2_000)).toBe(true);
  expect(isWithinTolerance(state, 7_999, 2_000)).toBe(false);
  expect(isWithinTolerance(state, 9_000, 0)).toBe(false);
});
