import { mergeClocks, mergeNodeFields, withConsensus, withLeaf, withResolution } from "@helixgraph/interface";
import type { AuthorId, AvatarState, GraphNode, NodeId, RoomId, Timestamp } from "@helixgraph/interface";

import type { ReplicaState, SyncEvent } from "./types.js";

export const DEFAULT_TOLERANCE_MS = 2000;

export function emptyReplicaState(roomId: RoomId): ReplicaState {
  return {
    roomId,
    nodes: new Map(),
    avatars: new Map(),
    vectorClock: {},
    lastUpdate: 0,
    tombstones: new Set(),
    writers: new Map(),
  };
}

/**
 * Replica-level conflict window: an event is fresh when it is newer than anything applied so far,
 * or older by at most `toleranceMs`. Anything earlier is stale.
 */
export function isWithinTolerance(state: ReplicaState, timestamp: Timestamp, toleranceMs: number): boolean {
  return timestamp > state.lastUpdate || state.lastUpdate - timestamp <= toleranceMs;
}

/**
 * `(updatedAt, writer)` order of node versions. Positive when `a` is later.
 */
export function compareVersions(
  a: { updatedAt: Timestamp; writer: AuthorId },
  b: { updatedAt: Timestamp; writer: AuthorId }
): number {
  if (a.updatedAt !== b.updatedAt) return a.updatedAt - b.updatedAt;
  return a.writer === b.writer ? 0 : a.writer < b.writer ? -1 : 1;
}

export type IgnoreReason = "tombstoned" | "superseded" | "missing";

export type ApplyResult =
  | { outcome: "applied"; state: ReplicaState }
  | { outcome: "ignored"; reason: IgnoreReason; state: ReplicaState };

function withNode(state: ReplicaState, node: GraphNode, writer: AuthorId): ReplicaState {
  const nodes = new Map(state.nodes);
  nodes.set(node.id, node);
  const writers = new Map(state.writers);
  writers.set(node.id, writer);
  return { ...state, nodes, writers };
}

function withAvatar(state: ReplicaState, avatar: AvatarState): ReplicaState {
  const avatars = new Map(state.avatars);
  avatars.set(avatar.id, avatar);
  return { ...state, avatars };
}

function upsertNode(state: ReplicaState, node: GraphNode, writer: AuthorId): ApplyResult {
  if (state.tombstones.has(node.id)) return { outcome: "ignored", reason: "tombstoned", state };
  const existing = state.nodes.get(node.id);
  if (!existing) return { outcome: "applied", state: withNode(state, node, writer) };

  const heldWriter = state.writers.get(existing.id) ?? existing.authorId;
  const held = { updatedAt: existing.updatedAt, writer: heldWriter };
  if (compareVersions({ updatedAt: node.updatedAt, writer }, held) < 0) {
    const merged = mergeNodeFields(existing, node);
    if (merged === existing) return { outcome: "ignored", reason: "superseded", state };
    return { outcome: "applied", state: withNode(state, merged, heldWriter) };
  }
  return { outcome: "applied", state: withNode(state, mergeNodeFields(node, existing), writer) };
}

/**
 * Field updates leave `updatedAt` and the writer alone, so they survive any later whole-node version.
 */
function updateFields(state: ReplicaState, nodeId: NodeId, update: (node: GraphNode) => GraphNode): ApplyResult {
  const node = state.nodes.get(nodeId);
  if (!node) return { outcome: "ignored", reason: "missing", state };
  return { outcome: "applied", state: withNode(state, update(node), state.writers.get(node.id) ?? node.authorId) };
}

function deleteNode(state: ReplicaState, nodeId: NodeId): ReplicaState {
  const nodes = new Map(state.nodes);
  nodes.delete(nodeId);
  const writers = new Map(state.writers);
  writers.delete(nodeId);
  const tombstones = new Set(state.tombstones);
  tombstones.add(nodeId);
  return { ...state, nodes, writers, tombstones };
}

function applyPayload(state: ReplicaState, event: SyncEvent): ApplyResult {
  switch (event.kind) {
    case "nodeCreated":
    case "nodeUpdated":
      return upsertNode(state, event.payload.node, event.authorId);
    case "nodeDeleted":
      return { outcome: "applied", state: deleteNode(state, event.payload.nodeId) };
    case "leafGenerated": {
      const { leaf } = event.payload;
      return updateFields(state, event.payload.nodeId, (node) => withLeaf(node, leaf));
    }
    case "consensusFormed": {
      const { participantIds } = event.payload;
      return updateFields(state, event.payload.nodeId, (node) => withConsensus(node, participantIds));
    }
    case "contentionResolved": {
      const resolution = { text: event.payload.resolution, resolvedBy: event.authorId, resolvedAt: event.timestamp };
      return updateFields(state, event.payload.nodeId, (node) => withResolution(node, resolution));
    }
    case "avatarMoved": {
      const avatar = state.avatars.get(event.payload.avatarId);
      if (!avatar) return { outcome: "ignored", reason: "missing", state };
      return {
        outcome: "applied",
        state: withAvatar(state, { ...avatar, position: event.payload.position, lastUpdate: event.timestamp }),
      };
    }
    case "avatarStateChanged": {
      const avatar = state.avatars.get(event.payload.avatarId);
      if (!avatar) return { outcome: "ignored", reason: "missing", state };
      return {
        outcome: "applied",
        state: withAvatar(state, {
          ...avatar,
          state: event.payload.state,
          energy: event.payload.energy ?? avatar.energy,
          lastUpdate: event.timestamp,
        }),
      };
    }
    case "participantJoined":
      return { outcome: "applied", state: withAvatar(state, event.payload.avatar) };
    case "participantLeft": {
      const avatars = new Map(state.avatars);
      avatars.delete(event.payload.avatarId);
      return { outcome: "applied", state: { ...state, avatars } };
    }
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
}

/**
 * Pure reducer behind the engine's apply path. Does not perform the tolerance check; see
 * {@link isWithinTolerance}. Whatever the outcome, the event counts as seen: its clock is merged and
 * `lastUpdate` advances.
 */
export function applyEventToState(state: ReplicaState, event: SyncEvent): ApplyResult {
  const result = applyPayload(state, event);
  const next: ReplicaState = {
    ...result.state,
    vectorClock: mergeClocks(result.state.vectorClock, event.vectorClock),
    lastUpdate: Math.max(result.state.lastUpdate, event.timestamp),
  };
  return { ...result, state: next };
}
