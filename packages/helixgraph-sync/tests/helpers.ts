import { createGraphNode, temporalPoint } from "@helixgraph/interface";
import type { AuthorId, GraphNode, Leaf, NodeId, Timestamp } from "@helixgraph/interface";

import type { EventTransport, SendResult, SyncEvent } from "../src/types.js";

export const ROOM = "room-1";

export function makeNode(opts: {
  id: NodeId;
  authorId: AuthorId;
  timestamp: Timestamp;
  parentId?: NodeId;
  content?: string;
  lane?: number;
  depth?: number;
  logicalClock?: number;
}): GraphNode {
  return createGraphNode({
    id: opts.id,
    roomId: ROOM,
    authorId: opts.authorId,
    ...(opts.parentId !== undefined ? { parentId: opts.parentId } : {}),
    content: opts.content ?? `content of ${opts.id}`,
    position: temporalPoint({
      timestamp: opts.timestamp,
      author: opts.authorId,
      authorLane: opts.lane ?? 0,
      totalLanes: 3,
      threadDepth: opts.depth ?? 0,
    }),
    logicalClock: opts.logicalClock ?? 1,
  });
}

export function makeLeaf(id: string, generatedAt: Timestamp = 5_000): Leaf {
  return {
    id,
    kind: "summary",
    title: `leaf ${id}`,
    content: "condensed thread",
    relevance: 0.75,
    generatedAt,
    todos: [{ text: "follow up", done: false }],
  };
}

export function created(node: GraphNode, counter = 1, timestamp: Timestamp = node.updatedAt): SyncEvent {
  return {
    kind: "nodeCreated",
    roomId: ROOM,
    authorId: node.authorId,
    payload: { node },
    vectorClock: { [node.authorId]: counter },
    timestamp,
  };
}

export function updated(node: GraphNode, authorId: AuthorId, counter: number): SyncEvent {
  return {
    kind: "nodeUpdated",
    roomId: ROOM,
    authorId,
    payload: { node },
    vectorClock: { [authorId]: counter },
    timestamp: node.updatedAt,
  };
}

export function deleted(nodeId: NodeId, authorId: AuthorId, counter: number, timestamp: Timestamp): SyncEvent {
  return {
    kind: "nodeDeleted",
    roomId: ROOM,
    authorId,
    payload: { nodeId },
    vectorClock: { [authorId]: counter },
    timestamp,
  };
}

export function left(authorId: AuthorId, counter: number, timestamp: Timestamp): SyncEvent {
  return {
    kind: "participantLeft",
    roomId: ROOM,
    authorId,
    payload: { avatarId: authorId },
    vectorClock: { [authorId]: counter },
    timestamp,
  };
}

export type FakeTransport = EventTransport & {
  sent: SyncEvent[];
  online: boolean;
  mode: "ok" | "fail" | "reject";
  emit: (event: SyncEvent) => void;
};

export function createFakeTransport(): FakeTransport {
  const handlers = new Set<(event: SyncEvent) => void>();
  const transport: FakeTransport = {
    sent: [],
    online: true,
    mode: "ok",
    async send(event): Promise<SendResult> {
      if (transport.mode === "fail") return { ok: false, reason: "transport", error: new Error("socket closed") };
      if (transport.mode === "reject") return { ok: false, reason: "rejected", message: "not allowed" };
      transport.sent.push(event);
      return { ok: true };
    },
    onEvent(handler) {
      handlers.add(handler);
      return () => {
        handlers.delete(handler);
      };
    },
    isOnline: () => transport.online,
    emit(event) {
      for (const h of handlers) h(event);
    },
  };
  return transport;
}

export function nodeContents(events: readonly SyncEvent[]): string[] {
  return events.flatMap((event) => (event.kind === "nodeCreated" ? [event.payload.node.content] : []));
}
