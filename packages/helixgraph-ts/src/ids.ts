import type { AuthorId, NodeId } from "./index.js";

export function bytesToHex(bytes: Uint8Array | ArrayLike<number>): string {
  const view = bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes);
  let out = "";
  for (const b of view) out += b.toString(16).padStart(2, "0");
  return out;
}

export function randomId(prefix: string): string {
  const uuid =
    typeof globalThis.crypto?.randomUUID === "function"
      ? globalThis.crypto.randomUUID()
      : `${Math.random().toString(16).slice(2)}_${Date.now().toString(16)}`;
  return `${prefix}_${uuid}`;
}

export function createNodeId(): NodeId {
  return randomId("n");
}

/**
 * Node ids are opaque, but must be non-empty after trimming.
 */
export function normalizeNodeId(nodeId: string): NodeId {
  const clean = nodeId.trim();
  if (clean.length === 0) throw new Error("NodeId must not be empty");
  return clean;
}

/**
 * Author ids key the vector clock, whose wire form is `author:n,author:n`. A comma would split a
 * pair, so it is rejected here; colons are allowed because the counter is taken after the last one.
 */
export function normalizeAuthorId(authorId: string): AuthorId {
  const clean = authorId.trim();
  if (clean.length === 0) throw new Error("AuthorId must not be empty");
  if (clean.includes(",")) throw new Error(`AuthorId must not contain ",": ${authorId}`);
  return clean;
}
