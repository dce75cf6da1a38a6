import type { AuthorId, TemporalPoint, Timestamp, Vec3 } from "./index.js";

export type HelixLayout = {
  /** Height units per millisecond. */
  timeScale: number;
  baseRadius: number;
  /** Room origin; elapsed time is measured from here so every replica lays out alike. */
  originMs: Timestamp;
  /** Radians of rotation per elapsed second. */
  spiralRate: number;
  /** Radius added per elapsed second. */
  radialGrowth: number;
  /** Radius added per reply level. */
  depthSpacing: number;
};

export const DEFAULT_HELIX_LAYOUT: HelixLayout = {
  timeScale: 0.1,
  baseRadius: 150,
  originMs: 0,
  spiralRate: 0.5,
  radialGrowth: 0.5,
  depthSpacing: 30,
};

export type HelixInput = {
  timestamp: Timestamp;
  authorLane: number;
  totalLanes: number;
  threadDepth: number;
};

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) throw new RangeError(`invalid ${name}: ${value}`);
}

export function resolveHelixLayout(layout: Partial<HelixLayout> = {}): HelixLayout {
  const out: HelixLayout = { ...DEFAULT_HELIX_LAYOUT, ...layout };
  for (const [name, value] of Object.entries(out)) requireFinite(name, value);
  if (out.timeScale <= 0) throw new RangeError(`invalid timeScale: ${out.timeScale}`);
  if (out.baseRadius < 0) throw new RangeError(`invalid baseRadius: ${out.baseRadius}`);
  if (out.radialGrowth < 0) throw new RangeError(`invalid radialGrowth: ${out.radialGrowth}`);
  if (out.depthSpacing < 0) throw new RangeError(`invalid depthSpacing: ${out.depthSpacing}`);
  return out;
}

export function authorAngle(authorLane: number, totalLanes: number): number {
  return (2 * Math.PI * authorLane) / totalLanes;
}

export function timeAngle(timestamp: Timestamp, layout: HelixLayout): number {
  return ((timestamp - layout.originMs) / 1000) * layout.spiralRate;
}

/**
 * Map a contribution onto the expanding helix: height follows time, the author lane picks the
 * angular offset, and reply depth pushes the point away from the spine.
 */
export function helixPosition(input: HelixInput, layout: Partial<HelixLayout> = {}): Vec3 {
  const cfg = resolveHelixLayout(layout);
  const { timestamp, authorLane, totalLanes, threadDepth } = input;

  requireFinite("timestamp", timestamp);
  requireFinite("authorLane", authorLane);
  requireFinite("totalLanes", totalLanes);
  requireFinite("threadDepth", threadDepth);
  if (!Number.isInteger(totalLanes) || totalLanes < 1) throw new RangeError(`invalid totalLanes: ${totalLanes}`);
  if (!Number.isInteger(authorLane) || authorLane < 0 || authorLane >= totalLanes) {
    throw new RangeError(`invalid authorLane: ${authorLane} (totalLanes: ${totalLanes})`);
  }
  if (!Number.isInteger(threadDepth) || threadDepth < 0) throw new RangeError(`invalid threadDepth: ${threadDepth}`);

  const elapsedMs = timestamp - cfg.originMs;
  const elapsedSeconds = elapsedMs / 1000;
  const angle = timeAngle(timestamp, cfg) + authorAngle(authorLane, totalLanes);
  const radius = cfg.baseRadius + cfg.radialGrowth * Math.max(0, elapsedSeconds) + cfg.depthSpacing * threadDepth;

  return {
    x: Math.cos(angle) * radius,
    y: elapsedMs * cfg.timeScale,
    z: Math.sin(angle) * radius,
  };
}

export function temporalPoint(
  input: HelixInput & { author: AuthorId },
  layout: Partial<HelixLayout> = {}
): TemporalPoint {
  return {
    timestamp: input.timestamp,
    authorLane: input.author,
    threadDepth: input.threadDepth,
    position: helixPosition(input, layout),
  };
}

/**
 * Assigns each author a lane in first-seen order. The lane count never drops below `minLanes`, so
 * the first few participants do not stack on top of each other.
 */
export class LaneRegistry {
  private readonly lanes = new Map<AuthorId, number>();

  constructor(private readonly minLanes = 3) {
    if (!Number.isInteger(minLanes) || minLanes < 1) throw new RangeError(`invalid minLanes: ${minLanes}`);
  }

  laneOf(author: AuthorId): number {
    const existing = this.lanes.get(author);
    if (existing !== undefined) return existing;
    const lane = this.lanes.size;
    this.lanes.set(author, lane);
    return lane;
  }

  has(author: AuthorId): boolean {
    return this.lanes.has(author);
  }

  totalLanes(): number {
    return Math.max(this.minLanes, this.lanes.size);
  }

  authors(): AuthorId[] {
    return Array.from(this.lanes.keys());
  }
}
