import type { NodeId } from "./index.js";

/**
 * Raised when the parent graph violates its own invariants (a cyclic parent chain, a merge that
 * points at a node the index does not hold). Callers should report it rather than retry.
 */
export class StructuralIntegrityError extends Error {
  readonly chain: readonly NodeId[];

  constructor(message: string, chain: readonly NodeId[] = []) {
    super(chain.length > 0 ? `${message}: ${chain.join(" -> ")}` : message);
    this.name = "StructuralIntegrityError";
    this.chain = chain;
  }
}

/** A remote or queued event (or one of its fields) that cannot be decoded. */
export class MalformedEventError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedEventError";
  }
}

export class InvalidStatusTransitionError extends Error {
  constructor(
    readonly nodeId: NodeId,
    readonly from: string,
    readonly to: string
  ) {
    super(`node ${nodeId}: cannot move status from ${from} to ${to}`);
    this.name = "InvalidStatusTransitionError";
  }
}
