import {
  LaneRegistry,
  TopologyIndex,
  advanceStatus,
  clockValue,
  createGraphNode,
  createNodeId,
  incrementClock,
  mergeClocks,
  normalizeAuthorId,
  normalizeNodeId,
  resolveHelixLayout,
  temporalPoint,
  withBranchTarget,
  withContent,
  withMergeSource,
  withReference,
} from "@helixgraph/interface";
import type {
  AuthorId,
  AvatarActivity,
  AvatarState,
  GraphNode,
  HelixLayout,
  Leaf,
  NodeId,
  NodeKind,
  NodeStatus,
  RoomId,
  Timestamp,
  TopologyView,
  Vec3,
  VectorClock,
} from "@helixgraph/interface";

import type { OfflineQueue } from "./offline-queue.js";
import type { ApplyResult } from "./replica.js";
import { DEFAULT_TOLERANCE_MS, applyEventToState, emptyReplicaState, isWithinTolerance } from "./replica.js";
import type {
  DeliveryStatus,
  EventTransport,
  ReplicaState,
  SendResult,
  SyncEvent,
  SyncEventOf,
  Unsubscribe,
} from "./types.js";

/**
 * Helix layout of a room. `originMs` is the room's creation time and must be the same on every
 * replica: positions are computed by the authoring replica and shipped inside the node.
 */
export type RoomLayout = Partial<HelixLayout> & Pick<HelixLayout, "originMs">;

export type SyncEngineOptions = {
  roomId: RoomId;
  authorId: AuthorId;
  transport: EventTransport;
  /** The author's counter resumes after the highest one still held here. */
  queue: OfflineQueue;
  layout: RoomLayout;
  /** How far behind `lastUpdate` a remote event may be and still apply. */
  toleranceMs?: number;
  minLanes?: number;
  now?: () => Timestamp;
  debug?: boolean;
  log?: (line: string) => void;
};

export type SubmitInput = {
  content: string;
  /** Must match the engine's author when given. */
  authorId?: AuthorId;
  replyTargetId?: NodeId;
  timestamp?: Timestamp;
  kind?: NodeKind;
  id?: NodeId;
};

export type JoinInput = {
  name: string;
  position?: Vec3;
  state?: AvatarActivity;
  energy?: number;
};

export type AppliedEvent = {
  event: SyncEvent;
  origin: "local" | "remote";
};

export type ReceiveOutcome = "applied" | "ignored" | "stale" | "self" | "foreign-room";

export type ReplayResult = {
  sent: number;
  remaining: number;
};

type EventBase = {
  roomId: RoomId;
  authorId: AuthorId;
  vectorClock: VectorClock;
  timestamp: Timestamp;
};

function touchedNodeId(event: SyncEvent): NodeId | undefined {
  switch (event.kind) {
    case "nodeCreated":
    case "nodeUpdated":
      return event.payload.node.id;
    case "nodeDeleted":
    case "leafGenerated":
    case "consensusFormed":
    case "contentionResolved":
      return event.payload.nodeId;
    case "avatarMoved":
    case "avatarStateChanged":
    case "participantJoined":
    case "participantLeft":
      return undefined;
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
}

function resumeClock(authorId: AuthorId, counter: number): VectorClock {
  return counter > 0 ? { [authorId]: counter } : {};
}

function requireEnergy(energy: number): number {
  if (!Number.isFinite(energy) || energy < 0 || energy > 1) throw new RangeError(`invalid energy: ${energy}`);
  return energy;
}

/**
 * Owns one room's replica. Local mutations and remote events share a single serialized apply chain;
 * delivery runs on a second chain so callers never wait on the network.
 */
export class SyncEngine {
  readonly roomId: RoomId;
  readonly authorId: AuthorId;

  private state: ReplicaState;
  private readonly index = new TopologyIndex();
  private readonly lanes: LaneRegistry;
  private readonly layout: HelixLayout;
  private readonly toleranceMs: number;
  private readonly transport: EventTransport;
  private readonly queue: OfflineQueue;
  private readonly now: () => Timestamp;
  private readonly debug: boolean;
  private readonly log: (line: string) => void;
  private readonly appliedHandlers = new Set<(applied: AppliedEvent) => void>();
  private readonly deliveryHandlers = new Set<(status: DeliveryStatus) => void>();
  private readonly detachTransport: Unsubscribe;

  private lastApply: Promise<void> = Promise.resolve();
  private lastDelivery: Promise<void> = Promise.resolve();
  private stale = 0;
  private closed = false;

  constructor(opts: SyncEngineOptions) {
    const toleranceMs = opts.toleranceMs ?? DEFAULT_TOLERANCE_MS;
    if (!Number.isFinite(toleranceMs) || toleranceMs < 0) throw new Error(`invalid toleranceMs: ${toleranceMs}`);

    this.roomId = opts.roomId;
    this.authorId = normalizeAuthorId(opts.authorId);
    this.toleranceMs = toleranceMs;
    this.layout = resolveHelixLayout(opts.layout);
    this.lanes = new LaneRegistry(opts.minLanes ?? 3);
    this.lanes.laneOf(this.authorId);
    this.transport = opts.transport;
    this.queue = opts.queue;
    this.now = opts.now ?? (() => Date.now());
    this.debug = Boolean(opts.debug);
    this.log = opts.log ?? ((line) => console.warn(line));
    this.state = {
      ...emptyReplicaState(opts.roomId),
      vectorClock: resumeClock(this.authorId, this.queue.lastCounter(this.authorId)),
    };
    this.detachTransport = this.transport.onEvent((event) => {
      this.receive(event).catch((err: unknown) => {
        this.log(`[sync:${this.authorId}] failed to apply ${event.kind} from ${event.authorId}: ${String(err)}`);
      });
    });
  }

  // Observers --------------------------------------------------------------------------------------

  onApplied(handler: (applied: AppliedEvent) => void): Unsubscribe {
    this.appliedHandlers.add(handler);
    return () => {
      this.appliedHandlers.delete(handler);
    };
  }

  onDelivery(handler: (status: DeliveryStatus) => void): Unsubscribe {
    this.deliveryHandlers.add(handler);
    return () => {
      this.deliveryHandlers.delete(handler);
    };
  }

  snapshot(): ReplicaState {
    return this.state;
  }

  topology(): TopologyView {
    return this.index;
  }

  pendingCount(): number {
    return this.queue.pendingCount();
  }

  /** Remote events dropped by the tolerance window so far. */
  get staleCount(): number {
    return this.stale;
  }

  // Local mutations --------------------------------------------------------------------------------

  async submit(input: SubmitInput): Promise<GraphNode> {
    if (input.authorId !== undefined && input.authorId !== this.authorId) {
      throw new Error(`cannot submit as ${input.authorId} from replica of ${this.authorId}`);
    }
    if (input.content.trim().length === 0) throw new Error("content must not be empty");

    const event = await this.emit((base): SyncEventOf<"nodeCreated"> => {
      const id = input.id !== undefined ? normalizeNodeId(input.id) : createNodeId();
      if (this.state.nodes.has(id) || this.state.tombstones.has(id)) throw new Error(`node already exists: ${id}`);

      let threadDepth = 0;
      if (input.replyTargetId !== undefined) {
        const parent = this.requireNode(input.replyTargetId);
        threadDepth = parent.position.threadDepth + 1;
      }

      const position = temporalPoint(
        {
          timestamp: base.timestamp,
          author: this.authorId,
          authorLane: this.lanes.laneOf(this.authorId),
          totalLanes: this.lanes.totalLanes(),
          threadDepth,
        },
        this.layout
      );
      const node = createGraphNode({
        id,
        roomId: this.roomId,
        authorId: this.authorId,
        ...(input.replyTargetId !== undefined ? { parentId: input.replyTargetId } : {}),
        content: input.content,
        ...(input.kind !== undefined ? { kind: input.kind } : {}),
        position,
        logicalClock: clockValue(base.vectorClock, this.authorId),
      });
      return { ...base, kind: "nodeCreated", payload: { node } };
    }, input.timestamp);

    return event.payload.node;
  }

  updateContent(nodeId: NodeId, content: string): Promise<GraphNode> {
    return this.updateNode(nodeId, (node, at) => withContent(node, content, at));
  }

  setStatus(nodeId: NodeId, status: NodeStatus): Promise<GraphNode> {
    return this.updateNode(nodeId, (node, at) => advanceStatus(node, status, at));
  }

  branch(fromId: NodeId, targetId: NodeId): Promise<GraphNode> {
    return this.updateNode(fromId, (node, at) => {
      this.requireNode(targetId);
      return withBranchTarget(node, targetId, at);
    });
  }

  merge(nodeId: NodeId, sourceId: NodeId): Promise<GraphNode> {
    return this.updateNode(nodeId, (node, at) => {
      this.requireNode(sourceId);
      return withMergeSource(node, sourceId, at);
    });
  }

  reference(nodeId: NodeId, targetId: NodeId): Promise<GraphNode> {
    return this.updateNode(nodeId, (node, at) => {
      this.requireNode(targetId);
      return withReference(node, targetId, at);
    });
  }

  async deleteNode(nodeId: NodeId): Promise<void> {
    await this.emit((base): SyncEventOf<"nodeDeleted"> => {
      this.requireNode(nodeId);
      return { ...base, kind: "nodeDeleted", payload: { nodeId } };
    });
  }

  async attachLeaf(nodeId: NodeId, leaf: Leaf): Promise<void> {
    if (!Number.isFinite(leaf.relevance) || leaf.relevance < 0 || leaf.relevance > 1) {
      throw new RangeError(`invalid relevance: ${leaf.relevance}`);
    }
    await this.emit((base): SyncEventOf<"leafGenerated"> => {
      this.requireNode(nodeId);
      return { ...base, kind: "leafGenerated", payload: { nodeId, leaf } };
    });
  }

  async formConsensus(nodeId: NodeId, participantIds: readonly AuthorId[]): Promise<void> {
    if (participantIds.length === 0) throw new Error("consensus needs at least one participant");
    await this.emit((base): SyncEventOf<"consensusFormed"> => {
      this.requireNode(nodeId);
      return {
        ...base,
        kind: "consensusFormed",
        payload: { nodeId, participantIds: Array.from(new Set(participantIds)).sort() },
      };
    });
  }

  async resolveContention(nodeId: NodeId, resolution: string): Promise<void> {
    if (resolution.trim().length === 0) throw new Error("resolution must not be empty");
    await this.emit((base): SyncEventOf<"contentionResolved"> => {
      this.requireNode(nodeId);
      return { ...base, kind: "contentionResolved", payload: { nodeId, resolution } };
    });
  }

  /** Sent for remote observers only; the local replica already knows where its own avatar is. */
  async moveAvatar(position: Vec3): Promise<void> {
    for (const [axis, value] of Object.entries(position)) {
      if (!Number.isFinite(value)) throw new RangeError(`invalid ${axis}: ${value}`);
    }
    await this.emit(
      (base): SyncEventOf<"avatarMoved"> => ({
        ...base,
        kind: "avatarMoved",
        payload: { avatarId: this.authorId, position: { x: position.x, y: position.y, z: position.z } },
      })
    );
  }

  async setAvatarState(state: AvatarActivity, energy?: number): Promise<void> {
    if (energy !== undefined) requireEnergy(energy);
    await this.emit(
      (base): SyncEventOf<"avatarStateChanged"> => ({
        ...base,
        kind: "avatarStateChanged",
        payload: { avatarId: this.authorId, state, ...(energy !== undefined ? { energy } : {}) },
      })
    );
  }

  async join(input: JoinInput): Promise<AvatarState> {
    const energy = requireEnergy(input.energy ?? 0.5);
    const event = await this.emit(
      (base): SyncEventOf<"participantJoined"> => ({
        ...base,
        kind: "participantJoined",
        payload: {
          avatar: {
            id: this.authorId,
            name: input.name,
            position: input.position ?? { x: 0, y: 0, z: 0 },
            state: input.state ?? "idle",
            energy,
            lastUpdate: base.timestamp,
          },
        },
      })
    );
    return event.payload.avatar;
  }

  async leave(): Promise<void> {
    await this.emit(
      (base): SyncEventOf<"participantLeft"> => ({
        ...base,
        kind: "participantLeft",
        payload: { avatarId: this.authorId },
      })
    );
  }

  // Remote events ----------------------------------------------------------------------------------

  receive(event: SyncEvent): Promise<ReceiveOutcome> {
    return this.runExclusive(() => this.applyRemote(event));
  }

  // Delivery ---------------------------------------------------------------------------------------

  /**
   * Resend everything in the offline queue, oldest first, with the clocks it was created with.
   * Stops at the first transport failure; a rejected event is dropped and reported.
   */
  reconnect(): Promise<ReplayResult> {
    const run = this.lastDelivery.then(() => this.replay());
    this.lastDelivery = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async flush(): Promise<void> {
    await this.lastApply;
    await this.lastDelivery;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.detachTransport();
    await this.flush();
  }

  // Internals --------------------------------------------------------------------------------------

  private runExclusive<T>(fn: () => T): Promise<T> {
    const run = this.lastApply.then(fn);
    this.lastApply = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private requireNode(nodeId: NodeId): GraphNode {
    const node = this.state.nodes.get(nodeId);
    if (!node) throw new Error(`unknown node: ${nodeId}`);
    return node;
  }

  private updateNode(nodeId: NodeId, change: (node: GraphNode, at: Timestamp) => GraphNode): Promise<GraphNode> {
    return this.emit((base): SyncEventOf<"nodeUpdated"> => {
      const node = this.requireNode(nodeId);
      // Local writes must order after the version they replace, even under a lagging clock.
      const at = base.timestamp > node.updatedAt ? base.timestamp : node.updatedAt + 1;
      const changed = change(node, at);
      const updated: GraphNode = {
        ...changed,
        updatedAt: at,
        logicalClock: clockValue(base.vectorClock, this.authorId),
      };
      return { ...base, kind: "nodeUpdated", payload: { node: updated } };
    }).then((event) => event.payload.node);
  }

  private emit<E extends SyncEvent>(make: (base: EventBase) => E, at?: Timestamp): Promise<E> {
    if (this.closed) return Promise.reject(new Error("engine is closed"));
    if (at !== undefined && !Number.isFinite(at)) return Promise.reject(new RangeError(`invalid timestamp: ${at}`));

    return this.runExclusive(() => {
      const event = make({
        roomId: this.roomId,
        authorId: this.authorId,
        vectorClock: incrementClock(this.state.vectorClock, this.authorId),
        timestamp: at ?? this.now(),
      });

      if (event.kind === "avatarMoved") {
        this.state = { ...this.state, vectorClock: mergeClocks(this.state.vectorClock, event.vectorClock) };
      } else {
        this.commit(applyEventToState(this.state, event), event, "local");
      }
      if (this.debug) this.log(`[sync:${this.authorId}] local ${event.kind}`);
      this.dispatch(event);
      return event;
    });
  }

  private applyRemote(event: SyncEvent): ReceiveOutcome {
    if (event.roomId !== this.roomId) {
      if (this.debug) this.log(`[sync:${this.authorId}] dropping ${event.kind} for room ${event.roomId}`);
      return "foreign-room";
    }
    if (event.authorId === this.authorId) {
      // Own events echoed back, such as a relay backlog after a restart, only advance the counter.
      const own = resumeClock(this.authorId, clockValue(event.vectorClock, this.authorId));
      this.state = { ...this.state, vectorClock: mergeClocks(this.state.vectorClock, own) };
      return "self";
    }
    if (!isWithinTolerance(this.state, event.timestamp, this.toleranceMs)) {
      this.stale += 1;
      if (this.debug) this.log(`[sync:${this.authorId}] stale ${event.kind} from ${event.authorId}`);
      return "stale";
    }

    const result = applyEventToState(this.state, event);
    this.commit(result, event, "remote");
    if (this.debug && result.outcome === "ignored") {
      this.log(`[sync:${this.authorId}] ignored ${event.kind} from ${event.authorId}: ${result.reason}`);
    }
    return result.outcome;
  }

  private commit(result: ApplyResult, event: SyncEvent, origin: AppliedEvent["origin"]): void {
    this.state = result.state;
    if (result.outcome !== "applied") return;

    const nodeId = touchedNodeId(event);
    if (nodeId !== undefined) {
      const node = this.state.nodes.get(nodeId);
      if (node) {
        this.lanes.laneOf(node.authorId);
        this.index.upsert(node);
      } else {
        this.index.remove(nodeId);
      }
    }
    for (const h of this.appliedHandlers) h({ event, origin });
  }

  private notify(status: DeliveryStatus): void {
    for (const h of this.deliveryHandlers) h(status);
  }

  private dispatch(event: SyncEvent): void {
    this.lastDelivery = this.lastDelivery
      .then(() => this.deliver(event))
      .catch((err: unknown) => {
        this.log(`[sync:${this.authorId}] delivery of ${event.kind} failed: ${String(err)}`);
        this.notify({ type: "failed", event, error: err });
      });
  }

  private async send(event: SyncEvent): Promise<SendResult> {
    if (!this.transport.isOnline()) return { ok: false, reason: "transport", error: new Error("offline") };
    try {
      return await this.transport.send(event);
    } catch (err) {
      return { ok: false, reason: "transport", error: err };
    }
  }

  private async deliver(event: SyncEvent): Promise<void> {
    // Anything still queued must go out first; new events line up behind it.
    if (this.queue.pendingCount() > 0) {
      await this.queue.enqueue(event);
      this.notify({ type: "queued", event });
      return;
    }

    const result = await this.send(event);
    if (result.ok) {
      this.notify({ type: "sent", event });
    } else if (result.reason === "rejected") {
      this.log(`[sync:${this.authorId}] ${event.kind} rejected: ${result.message}`);
      this.notify({ type: "rejected", event, message: result.message });
    } else {
      await this.queue.enqueue(event);
      this.notify({ type: "queued", event, error: result.error });
    }
  }

  private async replay(): Promise<ReplayResult> {
    const pending = await this.queue.drainPending();
    let sent = 0;
    for (const entry of pending) {
      const result = await this.send(entry.event);
      if (result.ok) {
        await this.queue.acknowledge(entry);
        sent += 1;
        this.notify({ type: "sent", event: entry.event });
      } else if (result.reason === "rejected") {
        await this.queue.acknowledge(entry);
        this.log(`[sync:${this.authorId}] queued ${entry.event.kind} rejected: ${result.message}`);
        this.notify({ type: "rejected", event: entry.event, message: result.message });
      } else {
        break;
      }
    }

    const remaining = this.queue.pendingCount();
    if (this.debug) this.log(`[sync:${this.authorId}] replayed ${sent}, ${remaining} remaining`);
    this.notify({ type: "replayed", sent, remaining });
    return { sent, remaining };
  }
}
