import { TopologyIndex, createGraphNode, temporalPoint } from "@helixgraph/interface";
import type { AuthorId, GraphNode, NodeId } from "@helixgraph/interface";
import { applyEventToState, emptyReplicaState } from "@helixgraph/sync";
import type { ReplicaState, SyncEvent } from "@helixgraph/sync";

import { quantile } from "./stats.js";
import type { BenchTiming } from "./timing.js";
import type { WorkloadName } from "./workloads.js";

export * from "./stats.js";
export * from "./timing.js";
export * from "./workloads.js";

export type BenchmarkResult = {
  name: string;
  totalOps: number;
  durationMs: number;
  opsPerSec: number;
  samplesMs: number[];
  p50Ms: number;
  p95Ms: number;
  extra?: Record<string, unknown>;
};

type RunOutput = { extra?: Record<string, unknown> } | undefined;

export type BenchmarkWorkload = {
  name: string;
  totalOps: number;
  prepare?: () => Promise<void> | void;
  run: () => Promise<RunOutput> | RunOutput;
  cleanup?: () => Promise<void> | void;
};

/** Warm-up runs are discarded; the reported duration is the median of the measured runs. */
export async function runBenchmark(
  workload: BenchmarkWorkload,
  timing: BenchTiming = { iterations: 1, warmupIterations: 0 }
): Promise<BenchmarkResult> {
  const samplesMs: number[] = [];
  let extra: Record<string, unknown> | undefined;

  for (let i = 0; i < timing.warmupIterations + timing.iterations; i += 1) {
    await workload.prepare?.();
    const start = performance.now();
    const out = await workload.run();
    const end = performance.now();
    await workload.cleanup?.();

    if (i < timing.warmupIterations) continue;
    samplesMs.push(end - start);
    if (out?.extra) extra = out.extra;
  }

  const durationMs = quantile(samplesMs, 0.5);
  const opsPerSec =
    workload.totalOps > 0 && durationMs > 0
      ? (workload.totalOps / durationMs) * 1000
      : durationMs > 0
        ? 1000 / durationMs
        : Infinity;

  return {
    name: workload.name,
    totalOps: workload.totalOps,
    durationMs,
    opsPerSec,
    samplesMs,
    p50Ms: durationMs,
    p95Ms: quantile(samplesMs, 0.95),
    ...(extra ? { extra } : {}),
  };
}

const ROOM = "bench-room";
const AUTHORS: readonly AuthorId[] = ["alice", "bob", "carol"];

function benchNode(i: number, parentId: NodeId | undefined, depth: number): GraphNode {
  const authorLane = i % AUTHORS.length;
  const authorId = AUTHORS[authorLane] ?? "alice";
  return createGraphNode({
    id: `n-${i}`,
    roomId: ROOM,
    authorId,
    ...(parentId !== undefined ? { parentId } : {}),
    content: `message ${i}`,
    position: temporalPoint({
      timestamp: i * 100,
      author: authorId,
      authorLane,
      totalLanes: AUTHORS.length,
      threadDepth: depth,
    }),
    logicalClock: i + 1,
  });
}

/** A single thread where every message answers the previous one. */
export function buildReplyChain(count: number): GraphNode[] {
  const nodes: GraphNode[] = [];
  for (let i = 0; i < count; i += 1) {
    nodes.push(benchNode(i, i === 0 ? undefined : `n-${i - 1}`, i));
  }
  return nodes;
}

/** A breadth-first tree where each message gets `fanout` replies. */
export function buildFanOut(count: number, fanout: number): GraphNode[] {
  if (!Number.isInteger(fanout) || fanout < 1) throw new Error(`invalid fanout: ${fanout}`);
  const depths: number[] = [];
  const nodes: GraphNode[] = [];
  for (let i = 0; i < count; i += 1) {
    const parent = i === 0 ? undefined : Math.floor((i - 1) / fanout);
    const depth = parent === undefined ? 0 : (depths[parent] ?? 0) + 1;
    depths.push(depth);
    nodes.push(benchNode(i, parent === undefined ? undefined : `n-${parent}`, depth));
  }
  return nodes;
}

// Insert a reply chain one node at a time, then walk it from the newest message.
export function makeReplyChainWorkload(opts: { count: number }): BenchmarkWorkload {
  const nodes = buildReplyChain(opts.count);
  const last = nodes[nodes.length - 1];
  return {
    name: `reply-chain-${opts.count}`,
    totalOps: opts.count,
    run: () => {
      const index = new TopologyIndex();
      for (const node of nodes) index.upsert(node);
      const depth = last ? index.getDepth(last.id) : 0;
      return { extra: { depth } };
    },
  };
}

export function makeFanOutWorkload(opts: { count: number; fanout?: number }): BenchmarkWorkload {
  const fanout = opts.fanout ?? 10;
  const nodes = buildFanOut(opts.count, fanout);
  return {
    name: `fan-out-${opts.count}`,
    totalOps: opts.count,
    run: () => {
      const index = TopologyIndex.fromNodes(nodes);
      const descendants = index.getDescendants("n-0").length;
      const metrics = index.calculateMetrics();
      return { extra: { fanout, descendants, averageDepth: metrics.averageDepth } };
    },
  };
}

export function replayLog(count: number): SyncEvent[] {
  return buildReplyChain(count).map((node, i) => ({
    kind: "nodeCreated",
    roomId: ROOM,
    authorId: node.authorId,
    payload: { node },
    vectorClock: { [node.authorId]: Math.floor(i / AUTHORS.length) + 1 },
    timestamp: node.createdAt,
  }));
}

// Simulate initial sync: fold a pre-built event log into an empty replica.
export function makeReplayLogWorkload(opts: { count: number }): BenchmarkWorkload {
  const events = replayLog(opts.count);
  return {
    name: `replay-log-${opts.count}`,
    totalOps: opts.count,
    run: () => {
      let state: ReplicaState = emptyReplicaState(ROOM);
      let ignored = 0;
      for (const event of events) {
        const result = applyEventToState(state, event);
        if (result.outcome === "ignored") ignored += 1;
        state = result.state;
      }
      return { extra: { nodes: state.nodes.size, ignored } };
    },
  };
}

export function makeWorkload(name: WorkloadName, count: number): BenchmarkWorkload {
  switch (name) {
    case "reply-chain":
      return makeReplyChainWorkload({ count });
    case "fan-out":
      return makeFanOutWorkload({ count });
    case "replay-log":
      return makeReplayLogWorkload({ count });
  }
}
