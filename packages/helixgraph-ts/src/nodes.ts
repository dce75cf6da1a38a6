import { InvalidStatusTransitionError, MalformedEventError } from "./errors.js";
import type {
  AuthorId,
  ContentionResolution,
  Edge,
  GraphNode,
  Leaf,
  NodeId,
  NodeKind,
  NodeStatus,
  RoomId,
  TemporalPoint,
  Timestamp,
} from "./index.js";
import { LEAF_KINDS, NODE_KINDS, NODE_STATUSES } from "./index.js";
import {
  expectArray,
  expectBoolean,
  expectInteger,
  expectIsoTimestamp,
  expectNonEmptyString,
  expectNumber,
  expectOneOf,
  expectRecord,
  expectString,
  expectStringArray,
  expectVec3,
  optionalString,
  timestampToIso,
} from "./json.js";

export type NewGraphNode = {
  id: NodeId;
  roomId: RoomId;
  authorId: AuthorId;
  parentId?: NodeId;
  content: string;
  kind?: NodeKind;
  position: TemporalPoint;
  logicalClock: number;
};

export function createGraphNode(input: NewGraphNode): GraphNode {
  return {
    id: input.id,
    roomId: input.roomId,
    authorId: input.authorId,
    ...(input.parentId !== undefined ? { parentId: input.parentId } : {}),
    content: input.content,
    kind: input.kind ?? "message",
    status: "draft",
    position: input.position,
    branchTargets: new Set(),
    references: new Set(),
    leaves: [],
    consensus: [],
    createdAt: input.position.timestamp,
    updatedAt: input.position.timestamp,
    logicalClock: input.logicalClock,
  };
}

export function statusRank(status: NodeStatus): number {
  return NODE_STATUSES.indexOf(status);
}

/**
 * Local transitions only move forward (`draft` → ... → `archived`); re-asserting the current
 * status is allowed. Concurrent versions merge to the higher rank, see {@link mergeNodeFields}.
 */
export function advanceStatus(node: GraphNode, status: NodeStatus, at: Timestamp): GraphNode {
  if (statusRank(status) < statusRank(node.status)) {
    throw new InvalidStatusTransitionError(node.id, node.status, status);
  }
  return { ...node, status, updatedAt: at };
}

export function withContent(node: GraphNode, content: string, at: Timestamp): GraphNode {
  return { ...node, content, updatedAt: at };
}

function compareLeaves(a: Leaf, b: Leaf): number {
  if (a.generatedAt !== b.generatedAt) return a.generatedAt - b.generatedAt;
  return a.id === b.id ? 0 : a.id < b.id ? -1 : 1;
}

export function withLeaf(node: GraphNode, leaf: Leaf): GraphNode {
  if (node.leaves.some((l) => l.id === leaf.id)) return node;
  return { ...node, leaves: [...node.leaves, leaf].sort(compareLeaves) };
}

export function withBranchTarget(node: GraphNode, target: NodeId, at: Timestamp): GraphNode {
  if (node.branchTargets.has(target)) return node;
  return { ...node, branchTargets: new Set([...node.branchTargets, target]), updatedAt: at };
}

export function withMergeSource(node: GraphNode, source: NodeId, at: Timestamp): GraphNode {
  return { ...node, mergeSource: source, updatedAt: at };
}

export function withReference(node: GraphNode, target: NodeId, at: Timestamp): GraphNode {
  if (node.references.has(target)) return node;
  return { ...node, references: new Set([...node.references, target]), updatedAt: at };
}

/**
 * Adds participants to the node's consensus and confirms it unless it is already confirmed or
 * archived. A field update: `updatedAt` stays put, so a concurrent content edit does not hide it.
 */
export function withConsensus(node: GraphNode, participants: readonly AuthorId[]): GraphNode {
  const consensus = Array.from(new Set([...node.consensus, ...participants])).sort();
  const status: NodeStatus = statusRank(node.status) < statusRank("confirmed") ? "confirmed" : node.status;
  if (status === node.status && consensus.length === node.consensus.length) return node;
  return { ...node, consensus, status };
}

function compareResolutions(a: ContentionResolution, b: ContentionResolution): number {
  if (a.resolvedAt !== b.resolvedAt) return a.resolvedAt - b.resolvedAt;
  if (a.resolvedBy !== b.resolvedBy) return a.resolvedBy < b.resolvedBy ? -1 : 1;
  return a.text === b.text ? 0 : a.text < b.text ? -1 : 1;
}

export function withResolution(node: GraphNode, resolution: ContentionResolution): GraphNode {
  if (node.resolution && compareResolutions(node.resolution, resolution) >= 0) return node;
  return { ...node, resolution };
}

/**
 * Folds the grow-only fields of `other` into `winner`, the version that won the `(updatedAt, writer)`
 * comparison: leaves and consensus are unioned, status takes the higher rank, and the later
 * resolution is kept. Returns `winner` itself when `other` adds nothing.
 */
export function mergeNodeFields(winner: GraphNode, other: GraphNode): GraphNode {
  let merged = winner;
  for (const leaf of other.leaves) merged = withLeaf(merged, leaf);
  if (statusRank(other.status) > statusRank(merged.status)) merged = { ...merged, status: other.status };
  if (other.consensus.length > 0) merged = withConsensus(merged, other.consensus);
  if (other.resolution) merged = withResolution(merged, other.resolution);
  return merged;
}

/**
 * Projection of the node's structural fields onto edges. Edges are never stored on their own; the
 * topology index derives them from nodes whenever asked.
 */
export function deriveEdges(node: GraphNode): Edge[] {
  const edges: Edge[] = [];
  if (node.parentId !== undefined) edges.push({ from: node.parentId, to: node.id, kind: "temporal" });
  for (const target of Array.from(node.branchTargets).sort()) {
    edges.push({ from: node.id, to: target, kind: "branch" });
  }
  if (node.mergeSource !== undefined) edges.push({ from: node.mergeSource, to: node.id, kind: "merge" });
  for (const target of Array.from(node.references).sort()) {
    edges.push({ from: node.id, to: target, kind: "reference" });
  }
  return edges;
}

// Wire form --------------------------------------------------------------------------------------

export type LeafJson = {
  id: string;
  kind: string;
  title: string;
  content: string;
  relevance: number;
  generatedAt: string;
  todos: { text: string; done: boolean }[];
};

export type TemporalPointJson = {
  timestamp: string;
  authorLane: string;
  threadDepth: number;
  position: { x: number; y: number; z: number };
};

export type ResolutionJson = {
  text: string;
  resolvedBy: string;
  resolvedAt: string;
};

export type GraphNodeJson = {
  id: string;
  roomId: string;
  authorId: string;
  parentId: string | null;
  content: string;
  kind: string;
  status: string;
  position: TemporalPointJson;
  branchTargets: string[];
  mergeSource: string | null;
  references: string[];
  leaves: LeafJson[];
  consensus: string[];
  resolution: ResolutionJson | null;
  createdAt: string;
  updatedAt: string;
  logicalClock: number;
};

export function leafToJson(leaf: Leaf): LeafJson {
  return {
    id: leaf.id,
    kind: leaf.kind,
    title: leaf.title,
    content: leaf.content,
    relevance: leaf.relevance,
    generatedAt: timestampToIso(leaf.generatedAt),
    todos: leaf.todos.map((t) => ({ text: t.text, done: t.done })),
  };
}

export function leafFromJson(value: unknown): Leaf {
  const obj = expectRecord(value, "leaf");
  const relevance = expectNumber(obj, "relevance");
  if (relevance < 0 || relevance > 1) throw new MalformedEventError(`relevance: out of range: ${relevance}`);
  return {
    id: expectNonEmptyString(obj, "id"),
    kind: expectOneOf(obj, "kind", LEAF_KINDS),
    title: expectString(obj, "title"),
    content: expectString(obj, "content"),
    relevance,
    generatedAt: expectIsoTimestamp(obj, "generatedAt"),
    todos: expectArray(obj, "todos").map((todo) => {
      const t = expectRecord(todo, "todo");
      return { text: expectString(t, "text"), done: expectBoolean(t, "done") };
    }),
  };
}

export function graphNodeToJson(node: GraphNode): GraphNodeJson {
  return {
    id: node.id,
    roomId: node.roomId,
    authorId: node.authorId,
    parentId: node.parentId ?? null,
    content: node.content,
    kind: node.kind,
    status: node.status,
    position: {
      timestamp: timestampToIso(node.position.timestamp),
      authorLane: node.position.authorLane,
      threadDepth: node.position.threadDepth,
      position: { x: node.position.position.x, y: node.position.position.y, z: node.position.position.z },
    },
    branchTargets: Array.from(node.branchTargets).sort(),
    mergeSource: node.mergeSource ?? null,
    references: Array.from(node.references).sort(),
    leaves: node.leaves.map(leafToJson),
    consensus: [...node.consensus],
    resolution: node.resolution
      ? {
          text: node.resolution.text,
          resolvedBy: node.resolution.resolvedBy,
          resolvedAt: timestampToIso(node.resolution.resolvedAt),
        }
      : null,
    createdAt: timestampToIso(node.createdAt),
    updatedAt: timestampToIso(node.updatedAt),
    logicalClock: node.logicalClock,
  };
}

export function resolutionFromJson(value: unknown): ContentionResolution {
  const obj = expectRecord(value, "resolution");
  return {
    text: expectNonEmptyString(obj, "text"),
    resolvedBy: expectNonEmptyString(obj, "resolvedBy"),
    resolvedAt: expectIsoTimestamp(obj, "resolvedAt"),
  };
}

export function graphNodeFromJson(value: unknown): GraphNode {
  const obj = expectRecord(value, "node");
  const pos = expectRecord(obj["position"], "position");
  const parentId = optionalString(obj, "parentId");
  const mergeSource = optionalString(obj, "mergeSource");
  const resolution = obj["resolution"] == null ? undefined : resolutionFromJson(obj["resolution"]);

  return {
    id: expectNonEmptyString(obj, "id"),
    roomId: expectNonEmptyString(obj, "roomId"),
    authorId: expectNonEmptyString(obj, "authorId"),
    ...(parentId !== undefined ? { parentId } : {}),
    content: expectString(obj, "content"),
    kind: expectOneOf(obj, "kind", NODE_KINDS),
    status: expectOneOf(obj, "status", NODE_STATUSES),
    position: {
      timestamp: expectIsoTimestamp(pos, "timestamp"),
      authorLane: expectNonEmptyString(pos, "authorLane"),
      threadDepth: expectInteger(pos, "threadDepth"),
      position: expectVec3(pos["position"], "position.position"),
    },
    branchTargets: new Set(expectStringArray(obj, "branchTargets")),
    ...(mergeSource !== undefined ? { mergeSource } : {}),
    references: new Set(expectStringArray(obj, "references")),
    leaves: expectArray(obj, "leaves").map(leafFromJson),
    consensus: expectStringArray(obj, "consensus"),
    ...(resolution !== undefined ? { resolution } : {}),
    createdAt: expectIsoTimestamp(obj, "createdAt"),
    updatedAt: expectIsoTimestamp(obj, "updatedAt"),
    logicalClock: expectInteger(obj, "logicalClock"),
  };
}
