import { MalformedEventError } from "./errors.js";
import type { AuthorId } from "./index.js";

/**
 * Per-author monotonic counters. Missing authors count as zero.
 */
export type VectorClock = Readonly<Record<AuthorId, number>>;

export type ClockOrder = "before" | "after" | "equal" | "concurrent";

export function clockValue(clock: VectorClock, author: AuthorId): number {
  return Object.prototype.hasOwnProperty.call(clock, author) ? (clock[author] ?? 0) : 0;
}

export function incrementClock(clock: VectorClock, author: AuthorId): VectorClock {
  return { ...clock, [author]: clockValue(clock, author) + 1 };
}

export function mergeClocks(a: VectorClock, b: VectorClock): VectorClock {
  const out: Record<AuthorId, number> = { ...a };
  for (const [author, counter] of Object.entries(b)) {
    if (counter > clockValue(out, author)) out[author] = counter;
  }
  return out;
}

export function compareClocks(a: VectorClock, b: VectorClock): ClockOrder {
  let less = false;
  let greater = false;
  const authors = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const author of authors) {
    const av = clockValue(a, author);
    const bv = clockValue(b, author);
    if (av < bv) less = true;
    if (av > bv) greater = true;
  }
  if (less && greater) return "concurrent";
  if (less) return "before";
  if (greater) return "after";
  return "equal";
}

/**
 * Wire form: `author1:n1,author2:n2`, authors sorted so equal clocks serialize identically.
 * Zero counters are omitted.
 */
export function serializeVectorClock(clock: VectorClock): string {
  return Object.keys(clock)
    .filter((author) => clockValue(clock, author) > 0)
    .sort()
    .map((author) => `${author}:${clockValue(clock, author)}`)
    .join(",");
}

/**
 * Inverse of {@link serializeVectorClock}. An empty or absent clock is all-zero.
 */
export function parseVectorClock(raw: string | null | undefined): VectorClock {
  const out: Record<AuthorId, number> = {};
  if (raw === null || raw === undefined) return out;
  const clean = raw.trim();
  if (clean.length === 0) return out;

  for (const pair of clean.split(",")) {
    const entry = pair.trim();
    if (entry.length === 0) continue;
    const sep = entry.lastIndexOf(":");
    if (sep <= 0) throw new MalformedEventError(`invalid vector clock entry: ${entry}`);
    const author = entry.slice(0, sep);
    const counterText = entry.slice(sep + 1);
    if (!/^\d+$/.test(counterText)) throw new MalformedEventError(`invalid vector clock counter: ${entry}`);
    const counter = Number(counterText);
    if (!Number.isSafeInteger(counter)) throw new MalformedEventError(`vector clock counter out of range: ${entry}`);
    if (counter > clockValue(out, author)) out[author] = counter;
  }
  return out;
}
