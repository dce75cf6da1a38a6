import { StructuralIntegrityError } from "./errors.js";
import type { AuthorId, Edge, GraphNode, NodeId, NodeKind, Timestamp } from "./index.js";
import { deriveEdges } from "./nodes.js";

export type TopologyMetrics = {
  totalNodes: number;
  totalBranches: number;
  totalMerges: number;
  totalMilestones: number;
  averageDepth: number;
  branchingFactor: number;
  mergeRate: number;
  convergenceScore: number;
};

/** Per-participant activity over the nodes currently in the index. */
export type ParticipantContribution = {
  authorId: AuthorId;
  messageCount: number;
  /** Total length of the participant's node contents. */
  characterCount: number;
  /** Weighted replies, merges and leaf relevance drawn by the participant's nodes, capped at 100. */
  influence: number;
  /** Nodes whose consensus lists the participant. */
  consensusParticipations: number;
  /** Milestones, and nodes carrying a decision leaf. */
  decisions: number;
  todoItems: number;
  branchPoints: number;
  mergePoints: number;
  /** Time between the participant's first and last node. */
  activeMs: number;
  /** Mean delay between a parent and the participant's reply to it, 0 without replies. */
  averageResponseMs: number;
};

const INFLUENCE_WEIGHTS: Record<NodeKind, number> = {
  message: 1,
  branch: 1.5,
  summary: 2,
  merge: 2.5,
  milestone: 3,
};

function compareNodes(a: GraphNode, b: GraphNode): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return a.id === b.id ? 0 : a.id < b.id ? -1 : 1;
}

/** Query surface of {@link TopologyIndex}, without the mutators. */
export type TopologyView = Pick<
  TopologyIndex,
  | "size"
  | "getNode"
  | "has"
  | "nodes"
  | "getChildren"
  | "getParent"
  | "getAncestors"
  | "getDepth"
  | "getPathToRoot"
  | "getDescendants"
  | "getCommonAncestor"
  | "getBranchSubtree"
  | "getRoots"
  | "getNodesInTimeRange"
  | "getAuthorNodes"
  | "getEdges"
  | "getMergeSource"
  | "calculateMetrics"
  | "calculateContributions"
>;

/**
 * Structural index over a room's nodes.
 *
 * Nodes live in an arena (`id → slot`); children are pre-grouped by parent id and kept ordered by
 * `(createdAt, id)`, so an index rebuilt from the same node set answers every query identically no
 * matter the insertion order. Children whose parent has not arrived yet are still grouped under the
 * parent id and show up once it does.
 *
 * Walks track visited slots; a walk that comes back to a slot throws {@link StructuralIntegrityError}.
 */
export class TopologyIndex {
  private readonly slots: (GraphNode | undefined)[] = [];
  private readonly freeSlots: number[] = [];
  private readonly slotById = new Map<NodeId, number>();
  private readonly childrenByParent = new Map<NodeId, NodeId[]>();

  static fromNodes(nodes: Iterable<GraphNode>): TopologyIndex {
    const index = new TopologyIndex();
    for (const node of nodes) index.upsert(node);
    return index;
  }

  get size(): number {
    return this.slotById.size;
  }

  upsert(node: GraphNode): void {
    const slot = this.slotById.get(node.id);
    if (slot !== undefined) {
      const previous = this.slots[slot];
      if (previous && (previous.parentId !== node.parentId || previous.createdAt !== node.createdAt)) {
        this.unlinkChild(previous);
        this.slots[slot] = node;
        this.linkChild(node);
      } else {
        this.slots[slot] = node;
      }
      return;
    }

    const free = this.freeSlots.pop();
    const next = free ?? this.slots.length;
    this.slots[next] = node;
    this.slotById.set(node.id, next);
    this.linkChild(node);
  }

  remove(id: NodeId): boolean {
    const slot = this.slotById.get(id);
    if (slot === undefined) return false;
    const node = this.slots[slot];
    if (node) this.unlinkChild(node);
    this.slots[slot] = undefined;
    this.slotById.delete(id);
    this.freeSlots.push(slot);
    return true;
  }

  getNode(id: NodeId): GraphNode | undefined {
    const slot = this.slotById.get(id);
    return slot === undefined ? undefined : this.slots[slot];
  }

  has(id: NodeId): boolean {
    return this.slotById.has(id);
  }

  nodes(): GraphNode[] {
    const out: GraphNode[] = [];
    for (const node of this.slots) if (node) out.push(node);
    return out.sort(compareNodes);
  }

  getChildren(id: NodeId): GraphNode[] {
    const ids = this.childrenByParent.get(id);
    if (!ids) return [];
    return this.resolve(ids);
  }

  getParent(id: NodeId): GraphNode | undefined {
    const node = this.getNode(id);
    return node?.parentId === undefined ? undefined : this.getNode(node.parentId);
  }

  /**
   * Parent chain, nearest first. Stops at a root or at a parent the index does not hold.
   */
  getAncestors(id: NodeId): GraphNode[] {
    const start = this.slotById.get(id);
    const node = start === undefined ? undefined : this.slots[start];
    if (start === undefined || !node) return [];

    const visited = new Set<number>([start]);
    const chain: NodeId[] = [node.id];
    const ancestors: GraphNode[] = [];

    let parentId = node.parentId;
    while (parentId !== undefined) {
      const slot = this.slotById.get(parentId);
      const parent = slot === undefined ? undefined : this.slots[slot];
      if (slot === undefined || !parent) break;
      chain.push(parent.id);
      if (visited.has(slot)) throw new StructuralIntegrityError("cyclic parent chain", chain);
      visited.add(slot);
      ancestors.push(parent);
      parentId = parent.parentId;
    }
    return ancestors;
  }

  getDepth(id: NodeId): number {
    return this.getAncestors(id).length;
  }

  getPathToRoot(id: NodeId): GraphNode[] {
    const node = this.getNode(id);
    if (!node) return [];
    return [node, ...this.getAncestors(id)];
  }

  /**
   * Depth-first pre-order over the child lists, the node itself excluded.
   */
  getDescendants(id: NodeId): GraphNode[] {
    const start = this.slotById.get(id);
    if (start === undefined) return [];

    const visited = new Set<number>([start]);
    const out: GraphNode[] = [];
    const stack: NodeId[] = [...(this.childrenByParent.get(id) ?? [])].reverse();

    while (stack.length > 0) {
      const nextId = stack.pop();
      if (nextId === undefined) break;
      const slot = this.slotById.get(nextId);
      const node = slot === undefined ? undefined : this.slots[slot];
      if (slot === undefined || !node) continue;
      if (visited.has(slot)) throw new StructuralIntegrityError("cycle below node", [id, nextId]);
      visited.add(slot);
      out.push(node);
      const children = this.childrenByParent.get(nextId);
      if (children) for (const child of [...children].reverse()) stack.push(child);
    }
    return out;
  }

  /**
   * Lowest common ancestor; a node counts as its own ancestor. `undefined` when the two ids sit in
   * disconnected components or either is unknown.
   */
  getCommonAncestor(a: NodeId, b: NodeId): GraphNode | undefined {
    if (!this.has(a) || !this.has(b)) return undefined;
    const seen = new Set(this.getPathToRoot(a).map((n) => n.id));
    return this.getPathToRoot(b).find((n) => seen.has(n.id));
  }

  getBranchSubtree(branchPointId: NodeId): GraphNode[] {
    const point = this.getNode(branchPointId);
    if (!point) return [];

    const seen = new Set<NodeId>();
    const out: GraphNode[] = [];
    for (const targetId of Array.from(point.branchTargets).sort()) {
      const target = this.getNode(targetId);
      if (!target) continue;
      for (const node of [target, ...this.getDescendants(targetId)]) {
        if (seen.has(node.id)) continue;
        seen.add(node.id);
        out.push(node);
      }
    }
    return out;
  }

  /** Nodes without a parent: the main temporal spine. */
  getRoots(): GraphNode[] {
    return this.nodes().filter((n) => n.parentId === undefined);
  }

  /** Exclusive on both ends. */
  getNodesInTimeRange(start: Timestamp, end: Timestamp): GraphNode[] {
    return this.nodes().filter((n) => n.position.timestamp > start && n.position.timestamp < end);
  }

  getAuthorNodes(authorId: AuthorId): GraphNode[] {
    return this.nodes().filter((n) => n.authorId === authorId);
  }

  getEdges(): Edge[] {
    return this.nodes().flatMap(deriveEdges);
  }

  getMergeSource(id: NodeId): GraphNode | undefined {
    const node = this.getNode(id);
    if (node?.mergeSource === undefined) return undefined;
    const source = this.getNode(node.mergeSource);
    if (!source) throw new StructuralIntegrityError("dangling merge source", [node.mergeSource, id]);
    return source;
  }

  calculateMetrics(): TopologyMetrics {
    const nodes = this.nodes();
    const totalNodes = nodes.length;
    let totalBranches = 0;
    let totalMerges = 0;
    let totalMilestones = 0;
    let totalDepth = 0;

    for (const node of nodes) {
      if (node.branchTargets.size > 0) totalBranches += 1;
      if (node.mergeSource !== undefined) totalMerges += 1;
      if (node.kind === "milestone") totalMilestones += 1;
      totalDepth += this.getDepth(node.id);
    }

    return {
      totalNodes,
      totalBranches,
      totalMerges,
      totalMilestones,
      averageDepth: totalNodes > 0 ? totalDepth / totalNodes : 0,
      branchingFactor: totalNodes > 0 ? totalBranches / totalNodes : 0,
      mergeRate: totalNodes > 0 ? totalMerges / totalNodes : 0,
      convergenceScore: totalBranches > 0 ? totalMerges / totalBranches : 1,
    };
  }

  calculateContributions(authorId: AuthorId): ParticipantContribution {
    const all = this.nodes();
    const own = all.filter((n) => n.authorId === authorId);

    let characterCount = 0;
    let influence = 0;
    let decisions = 0;
    let todoItems = 0;
    let branchPoints = 0;
    let mergePoints = 0;
    let responseTotal = 0;
    let responses = 0;

    for (const node of own) {
      characterCount += node.content.length;

      const mergedFrom = all.filter((n) => n.mergeSource === node.id).length;
      const drawn = (this.childrenByParent.get(node.id)?.length ?? 0) + mergedFrom;
      const relevance = node.leaves.reduce((sum, leaf) => sum + leaf.relevance, 0);
      influence += (drawn * 0.5 + relevance) * INFLUENCE_WEIGHTS[node.kind];

      if (node.kind === "milestone" || node.leaves.some((leaf) => leaf.kind === "decision")) decisions += 1;
      todoItems += node.leaves.reduce((sum, leaf) => sum + leaf.todos.length, 0);
      if (node.kind === "branch" || node.branchTargets.size > 0) branchPoints += 1;
      if (node.kind === "merge" || node.mergeSource !== undefined) mergePoints += 1;

      const parent = this.getParent(node.id);
      if (parent) {
        responseTotal += node.position.timestamp - parent.position.timestamp;
        responses += 1;
      }
    }

    const times = own.map((n) => n.position.timestamp);
    return {
      authorId,
      messageCount: own.length,
      characterCount,
      influence: Math.min(influence * 10, 100),
      consensusParticipations: all.filter((n) => n.consensus.includes(authorId)).length,
      decisions,
      todoItems,
      branchPoints,
      mergePoints,
      activeMs: times.length > 0 ? Math.max(...times) - Math.min(...times) : 0,
      averageResponseMs: responses > 0 ? Math.trunc(responseTotal / responses) : 0,
    };
  }

  private resolve(ids: readonly NodeId[]): GraphNode[] {
    const out: GraphNode[] = [];
    for (const id of ids) {
      const node = this.getNode(id);
      if (node) out.push(node);
    }
    return out;
  }

  private linkChild(node: GraphNode): void {
    if (node.parentId === undefined) return;
    let siblings = this.childrenByParent.get(node.parentId);
    if (!siblings) {
      siblings = [];
      this.childrenByParent.set(node.parentId, siblings);
    }

    let at = siblings.length;
    while (at > 0) {
      const prevId = siblings[at - 1];
      const prev = prevId === undefined ? undefined : this.getNode(prevId);
      if (!prev || compareNodes(prev, node) <= 0) break;
      at -= 1;
    }
    siblings.splice(at, 0, node.id);
  }

  private unlinkChild(node: GraphNode): void {
    if (node.parentId === undefined) return;
    const siblings = this.childrenByParent.get(node.parentId);
    if (!siblings) return;
    const at = siblings.indexOf(node.id);
    if (at !== -1) siblings.splice(at, 1);
    if (siblings.length === 0) this.childrenByParent.delete(node.parentId);
  }
}
