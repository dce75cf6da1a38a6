export type NodeId = string;
export type AuthorId = string;
export type RoomId = string;
// Milliseconds since the Unix epoch.
export type Timestamp = number;

export type Vec3 = {
  x: number;
  y: number;
  z: number;
};

export type TemporalPoint = {
  timestamp: Timestamp;
  authorLane: AuthorId;
  threadDepth: number;
  /**
   * Derived by the coordinate engine from the other three fields and the room layout.
   * Never mutated on its own.
   */
  position: Vec3;
};

export const NODE_STATUSES = ["draft", "placed", "connected", "confirmed", "archived"] as const;
export type NodeStatus = (typeof NODE_STATUSES)[number];

export const NODE_KINDS = ["message", "branch", "merge", "milestone", "summary"] as const;
export type NodeKind = (typeof NODE_KINDS)[number];

export const LEAF_KINDS = ["summary", "actionItems", "decision", "riskAlert", "insight", "reference"] as const;
export type LeafKind = (typeof LEAF_KINDS)[number];

export type LeafTodo = {
  text: string;
  done: boolean;
};

/**
 * Semantic attachment produced by an external summarizer. Opaque to the engine apart from `id`,
 * which makes repeated attachment idempotent.
 */
export type Leaf = {
  id: string;
  kind: LeafKind;
  title: string;
  content: string;
  /** Relevance to the owning node in `[0, 1]`. */
  relevance: number;
  generatedAt: Timestamp;
  todos: LeafTodo[];
};

/** Outcome of a settled disagreement over a node. The later `(resolvedAt, resolvedBy)` wins. */
export type ContentionResolution = {
  text: string;
  resolvedBy: AuthorId;
  resolvedAt: Timestamp;
};

export type GraphNode = {
  id: NodeId;
  roomId: RoomId;
  authorId: AuthorId;
  parentId?: NodeId;
  content: string;
  kind: NodeKind;
  status: NodeStatus;
  position: TemporalPoint;
  branchTargets: ReadonlySet<NodeId>;
  mergeSource?: NodeId;
  references: ReadonlySet<NodeId>;
  /** Ordered by `(generatedAt, id)`. */
  leaves: readonly Leaf[];
  /** Every participant recorded by a consensus event on this node, sorted. */
  consensus: readonly AuthorId[];
  resolution?: ContentionResolution;
  createdAt: Timestamp;
  updatedAt: Timestamp;
  /** Author counter of the vector clock at the mutation that produced this version. */
  logicalClock: number;
};

export type EdgeKind = "temporal" | "branch" | "merge" | "reference";

export type Edge = {
  from: NodeId;
  to: NodeId;
  kind: EdgeKind;
};

export const AVATAR_ACTIVITIES = ["idle", "flying", "working", "speaking"] as const;
export type AvatarActivity = (typeof AVATAR_ACTIVITIES)[number];

export type AvatarState = {
  id: AuthorId;
  name: string;
  position: Vec3;
  state: AvatarActivity;
  /** Glow intensity in `[0, 1]`. */
  energy: number;
  lastUpdate: Timestamp;
};

export * from "./errors.js";
export * from "./ids.js";
export * from "./clock.js";
export * from "./coordinates.js";
export * from "./nodes.js";
export * from "./topology.js";
export * from "./adapter.js";
export * from "./json.js";
