import { expect, test } from "vitest";

import { jsonSyncEventCodec } from "@helixgraph/sync";
import type { SyncEvent } from "@helixgraph/sync";

import { RoomHub } from "../src/hub.js";
import type { RelayPeer } from "../src/hub.js";

function fakePeer(id: string, roomId = "room-1"): RelayPeer & { received: string[] } {
  const received: string[] = [];
  return { id, roomId, received, send: (frame) => received.push(frame) };
}

function leftFrame(authorId: string, counter: number, roomId = "room-1"): string {
  const event: SyncEvent = {
    kind: "participantLeft",
    roomId,
    authorId,
    payload: { avatarId: authorId },
    vectorClock: { [authorId]: counter },
    timestamp: counter * 1_000,
  };
  return jsonSyncEventCodec.encode(event);
}

function movedFrame(authorId: string, counter: number): string {
  return jsonSyncEventCodec.encode({
    kind: "avatarMoved",
    roomId: "room-1",
    authorId,
    payload: { avatarId: authorId, position: { x: 1, y: 2, z: 3 } },
    vectorClock: { [authorId]: counter },
    timestamp: counter * 1_000,
  });
}

test("frames fan out to the other peers of the sender's room only", () => {
  const hub = new RoomHub({ log: () => {} });
  const alice = fakePeer("alice");
  const bob = fakePeer("bob");
  const stranger = fakePeer("stranger", "room-2");
  hub.join(alice);
  hub.join(bob);
  hub.join(stranger);

  const frame = leftFrame("alice", 1);
  const outcome = hub.publish(alice, frame);

  expect(outcome).toMatchObject({ type: "relayed", recipients: 1 });
  expect(bob.received).toEqual([frame]);
  expect(alice.received).toEqual([]);
  expect(stranger.received).toEqual([]);
});

test("late joiners receive the backlog in arrival order, without avatar moves", () => {
  const hub = new RoomHub({ backlog: 2, log: () => {} });
  const alice = fakePeer("alice");
  hub.join(alice);

  const first = leftFrame("alice", 1);
  const second = leftFrame("alice", 2);
  const third = leftFrame("alice", 3);
  hub.publish(alice, first);
  hub.publish(alice, movedFrame("alice", 4));
  hub.publish(alice, second);
  hub.publish(alice, third);

  expect(hub.backlog("room-1")).toEqual([second, third]);

  const carol = fakePeer("carol");
  hub.join(carol);
  expect(carol.received).toEqual([second, third]);
});

test("malformed frames and frames for another room are dropped and logged", () => {
  const lines: string[] = [];
  const hub = new RoomHub({ log: (line) => lines.push(line) });
  const alice = fakePeer("alice");
  const bob = fakePeer("bob");
  hub.join(alice);
  hub.join(bob);

  expect(hub.publish(alice, "{not json").type).toBe("malformed");
  expect(hub.publish(alice, leftFrame("alice", 1, "room-2"))).toEqual({ type: "room-mismatch", roomId: "room-2" });

  expect(bob.received).toEqual([]);
  expect(hub.backlog("room-1")).toEqual([]);
  expect(lines).toHaveLength(2);
  expect(lines[0]?.startsWith("[relay:room-1] dropping malformed frame from alice: ")).toBe(true);
  expect(lines[1]).toBe("[relay:room-1] dropping frame for room room-2 from alice");
});

test("leaving stops delivery and updates the peer count", () => {
  const hub = new RoomHub({ log: () => {} });
  const alice = fakePeer("alice");
  const bob = fakePeer("bob");
  hub.join(alice);
  const leave = hub.join(bob);
  expect(hub.peerCount("room-1")).toBe(2);

  leave();
  expect(hub.peerCount("room-1")).toBe(1);
  expect(hub.publish(alice, leftFrame("alice", 1))).toMatchObject({ type: "relayed", recipients: 0 });
  expect(bob.received).toEqual([]);
  expect(hub.peerCount("room-9")).toBe(0);
});

test("invalid backlog sizes are refused", () => {
  expect(() => new RoomHub({ backlog: -1 })).toThrow("invalid backlog: -1");
  expect(() => new RoomHub({ backlog: 1.5 })).toThrow("invalid backlog: 1.5");
});
