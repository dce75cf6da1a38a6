import type {
  AuthorId,
  AvatarActivity,
  AvatarState,
  GraphNode,
  Leaf,
  NodeId,
  RoomId,
  Timestamp,
  Vec3,
  VectorClock,
} from "@helixgraph/interface";

export type SyncEventPayloads = {
  nodeCreated: { node: GraphNode };
  nodeUpdated: { node: GraphNode };
  nodeDeleted: { nodeId: NodeId };
  leafGenerated: { nodeId: NodeId; leaf: Leaf };
  avatarMoved: { avatarId: AuthorId; position: Vec3 };
  avatarStateChanged: { avatarId: AuthorId; state: AvatarActivity; energy?: number };
  participantJoined: { avatar: AvatarState };
  participantLeft: { avatarId: AuthorId };
  consensusFormed: { nodeId: NodeId; participantIds: AuthorId[] };
  contentionResolved: { nodeId: NodeId; resolution: string };
};

export type SyncEventKind = keyof SyncEventPayloads;

export const SYNC_EVENT_KINDS = [
  "nodeCreated",
  "nodeUpdated",
  "nodeDeleted",
  "leafGenerated",
  "avatarMoved",
  "avatarStateChanged",
  "participantJoined",
  "participantLeft",
  "consensusFormed",
  "contentionResolved",
] as const satisfies readonly SyncEventKind[];

/**
 * The unit of replication. Immutable once created; `vectorClock` is the author's full clock right
 * after the increment that produced the event.
 */
export type SyncEvent = {
  [K in SyncEventKind]: {
    kind: K;
    roomId: RoomId;
    authorId: AuthorId;
    payload: SyncEventPayloads[K];
    vectorClock: VectorClock;
    timestamp: Timestamp;
  };
}[SyncEventKind];

export type SyncEventOf<K extends SyncEventKind> = Extract<SyncEvent, { kind: K }>;

/**
 * JSON-compatible wire representation.
 */
export type SyncEventWire = {
  type: SyncEventKind;
  roomId: string;
  userId: string;
  data: Record<string, unknown>;
  /** `author1:n1,author2:n2` */
  vectorClock: string;
  /** ISO-8601 */
  timestamp: string;
};

export type ReplicaState = {
  roomId: RoomId;
  nodes: ReadonlyMap<NodeId, GraphNode>;
  avatars: ReadonlyMap<AuthorId, AvatarState>;
  vectorClock: VectorClock;
  lastUpdate: Timestamp;
  /** Ids removed by `nodeDeleted`; a late create for one of these is ignored. */
  tombstones: ReadonlySet<NodeId>;
  /** Author of the version currently held for each node; breaks `updatedAt` ties. */
  writers: ReadonlyMap<NodeId, AuthorId>;
};

export type SendResult =
  | { ok: true }
  | { ok: false; reason: "transport"; error: unknown }
  | { ok: false; reason: "rejected"; message: string };

export type Unsubscribe = () => void;

/**
 * Network collaborator. `send` resolves to a result rather than throwing: only `"transport"`
 * failures are retried later, a `"rejected"` event was refused by the peer and is not.
 */
export interface EventTransport {
  send(event: SyncEvent): Promise<SendResult>;
  onEvent(handler: (event: SyncEvent) => void): Unsubscribe;
  isOnline(): boolean;
}

export type QueuedEvent = {
  key: string;
  event: SyncEvent;
};

export type DeliveryStatus =
  | { type: "sent"; event: SyncEvent }
  | { type: "queued"; event: SyncEvent; error?: unknown }
  | { type: "rejected"; event: SyncEvent; message: string }
  | { type: "replayed"; sent: number; remaining: number }
  | { type: "failed"; event: SyncEvent; error: unknown };
