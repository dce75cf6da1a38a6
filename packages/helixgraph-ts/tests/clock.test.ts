import { expect, test } from "vitest";

import {
  MalformedEventError,
  clockValue,
  compareClocks,
  incrementClock,
  mergeClocks,
  normalizeAuthorId,
  parseVectorClock,
  serializeVectorClock,
} from "../src/index.js";

test("increment touches only the given author", () => {
  const clock = incrementClock(incrementClock({ bob: 4 }, "alice"), "alice");
  expect(clock).toEqual({ alice: 2, bob: 4 });
  expect(clockValue(clock, "carol")).toBe(0);
});

test("merge takes the point-wise maximum", () => {
  expect(mergeClocks({ alice: 3, bob: 1 }, { bob: 5, carol: 2 })).toEqual({ alice: 3, bob: 5, carol: 2 });
});

test("compare distinguishes causal order from concurrency", () => {
  expect(compareClocks({ alice: 1 }, { alice: 2 })).toBe("before");
  expect(compareClocks({ alice: 2, bob: 1 }, { alice: 2 })).toBe("after");
  expect(compareClocks({ alice: 1 }, { alice: 1, bob: 0 })).toBe("equal");
  expect(compareClocks({ alice: 2 }, { bob: 1 })).toBe("concurrent");
});

test("serialization sorts authors and drops zero counters", () => {
  expect(serializeVectorClock({ carol: 0, bob: 2, alice: 7 })).toBe("alice:7,bob:2");
  expect(serializeVectorClock({})).toBe("");
});

test("parse accepts what serialize produces, and empty input", () => {
  expect(parseVectorClock("alice:7,bob:2")).toEqual({ alice: 7, bob: 2 });
  expect(parseVectorClock(" alice:1 , ,bob:3 ")).toEqual({ alice: 1, bob: 3 });
  expect(parseVectorClock("")).toEqual({});
  expect(parseVectorClock(undefined)).toEqual({});
  expect(parseVectorClock(null)).toEqual({});
});

test("authors may contain colons; the counter follows the last one", () => {
  expect(parseVectorClock("user:alice:4")).toEqual({ "user:alice": 4 });
  expect(serializeVectorClock({ "user:alice": 4 })).toBe("user:alice:4");
});

test("malformed clocks are rejected", () => {
  expect(() => parseVectorClock("alice")).toThrow(MalformedEventError);
  expect(() => parseVectorClock(":3")).toThrow(MalformedEventError);
  expect(() => parseVectorClock("alice:-1")).toThrow("invalid vector clock counter: alice:-1");
  expect(() => parseVectorClock("alice:1.5")).toThrow(MalformedEventError);
});

test("author ids are trimmed and may not contain commas", () => {
  expect(normalizeAuthorId("  alice ")).toBe("alice");
  expect(() => normalizeAuthorId("a,b")).toThrow('AuthorId must not contain ",": a,b');
  expect(() => normalizeAuthorId("   ")).toThrow("AuthorId must not be empty");
});
