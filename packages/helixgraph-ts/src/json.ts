import { MalformedEventError } from "./errors.js";
import type { Timestamp, Vec3 } from "./index.js";

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function expectRecord(value: unknown, field: string): JsonRecord {
  if (!isRecord(value)) throw new MalformedEventError(`${field}: expected object`);
  return value;
}

export function expectString(obj: JsonRecord, field: string): string {
  const value = obj[field];
  if (typeof value !== "string") throw new MalformedEventError(`${field}: expected string`);
  return value;
}

export function expectNonEmptyString(obj: JsonRecord, field: string): string {
  const value = expectString(obj, field).trim();
  if (value.length === 0) throw new MalformedEventError(`${field}: must not be empty`);
  return value;
}

export function optionalString(obj: JsonRecord, field: string): string | undefined {
  const value = obj[field];
  if (value === null || value === undefined) return undefined;
  if (typeof value !== "string") throw new MalformedEventError(`${field}: expected string or null`);
  return value;
}

export function expectNumber(obj: JsonRecord, field: string): number {
  const value = obj[field];
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new MalformedEventError(`${field}: expected finite number`);
  }
  return value;
}

export function expectInteger(obj: JsonRecord, field: string): number {
  const value = expectNumber(obj, field);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new MalformedEventError(`${field}: expected non-negative integer`);
  }
  return value;
}

export function expectBoolean(obj: JsonRecord, field: string): boolean {
  const value = obj[field];
  if (typeof value !== "boolean") throw new MalformedEventError(`${field}: expected boolean`);
  return value;
}

export function expectOneOf<T extends string>(obj: JsonRecord, field: string, allowed: readonly T[]): T {
  const value = expectString(obj, field);
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new MalformedEventError(`${field}: expected one of ${allowed.join(", ")}, got ${value}`);
  }
  return match;
}

export function expectStringArray(obj: JsonRecord, field: string): string[] {
  const value = obj[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new MalformedEventError(`${field}: expected array`);
  return value.map((item, idx) => {
    if (typeof item !== "string") throw new MalformedEventError(`${field}[${idx}]: expected string`);
    return item;
  });
}

export function expectArray(obj: JsonRecord, field: string): unknown[] {
  const value = obj[field];
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) throw new MalformedEventError(`${field}: expected array`);
  return value;
}

export function timestampToIso(ts: Timestamp): string {
  return new Date(ts).toISOString();
}

export function expectIsoTimestamp(obj: JsonRecord, field: string): Timestamp {
  const ms = Date.parse(expectString(obj, field));
  if (!Number.isFinite(ms)) throw new MalformedEventError(`${field}: invalid timestamp`);
  return ms;
}

export function expectVec3(value: unknown, field: string): Vec3 {
  const obj = expectRecord(value, field);
  return {
    x: expectNumber(obj, "x"),
    y: expectNumber(obj, "y"),
    z: expectNumber(obj, "z"),
  };
}
