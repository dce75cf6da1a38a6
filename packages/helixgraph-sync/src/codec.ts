import { decode as cborDecode, encode as cborEncode } from "cborg";

import {
  AVATAR_ACTIVITIES,
  MalformedEventError,
  expectIsoTimestamp,
  expectNonEmptyString,
  expectNumber,
  expectOneOf,
  expectRecord,
  expectStringArray,
  expectVec3,
  graphNodeFromJson,
  graphNodeToJson,
  leafFromJson,
  leafToJson,
  parseVectorClock,
  serializeVectorClock,
  timestampToIso,
} from "@helixgraph/interface";
import type { AvatarState, JsonRecord } from "@helixgraph/interface";

import type { WireCodec } from "./transport.js";
import type { SyncEvent, SyncEventWire } from "./types.js";
import { SYNC_EVENT_KINDS } from "./types.js";

function avatarToJson(avatar: AvatarState): JsonRecord {
  return {
    id: avatar.id,
    name: avatar.name,
    position: { x: avatar.position.x, y: avatar.position.y, z: avatar.position.z },
    state: avatar.state,
    energy: avatar.energy,
    lastUpdate: timestampToIso(avatar.lastUpdate),
  };
}

function avatarFromJson(value: unknown): AvatarState {
  const obj = expectRecord(value, "avatar");
  return {
    id: expectNonEmptyString(obj, "id"),
    name: typeof obj["name"] === "string" ? obj["name"] : "",
    position: expectVec3(obj["position"], "avatar.position"),
    state: expectOneOf(obj, "state", AVATAR_ACTIVITIES),
    energy: expectEnergy(obj),
    lastUpdate: expectIsoTimestamp(obj, "lastUpdate"),
  };
}

function expectEnergy(obj: JsonRecord): number {
  const energy = expectNumber(obj, "energy");
  if (energy < 0 || energy > 1) throw new MalformedEventError(`energy: out of range: ${energy}`);
  return energy;
}

function eventDataToJson(event: SyncEvent): JsonRecord {
  switch (event.kind) {
    case "nodeCreated":
    case "nodeUpdated":
      return { node: graphNodeToJson(event.payload.node) };
    case "nodeDeleted":
      return { nodeId: event.payload.nodeId };
    case "leafGenerated":
      return { nodeId: event.payload.nodeId, leaf: leafToJson(event.payload.leaf) };
    case "avatarMoved": {
      const { x, y, z } = event.payload.position;
      return { avatarId: event.payload.avatarId, position: { x, y, z } };
    }
    case "avatarStateChanged":
      return {
        avatarId: event.payload.avatarId,
        state: event.payload.state,
        ...(event.payload.energy !== undefined ? { energy: event.payload.energy } : {}),
      };
    case "participantJoined":
      return { avatar: avatarToJson(event.payload.avatar) };
    case "participantLeft":
      return { avatarId: event.payload.avatarId };
    case "consensusFormed":
      return { nodeId: event.payload.nodeId, participantIds: [...event.payload.participantIds] };
    case "contentionResolved":
      return { nodeId: event.payload.nodeId, resolution: event.payload.resolution };
    default: {
      const _exhaustive: never = event;
      return _exhaustive;
    }
  }
}

export function syncEventToWire(event: SyncEvent): SyncEventWire {
  return {
    type: event.kind,
    roomId: event.roomId,
    userId: event.authorId,
    data: eventDataToJson(event),
    vectorClock: serializeVectorClock(event.vectorClock),
    timestamp: timestampToIso(event.timestamp),
  };
}

/**
 * Validate and decode a wire object. Throws {@link MalformedEventError} on anything that does not
 * describe a complete event.
 */
export function syncEventFromWire(value: unknown): SyncEvent {
  const wire = expectRecord(value, "event");
  const kind = expectOneOf(wire, "type", SYNC_EVENT_KINDS);
  const roomId = expectNonEmptyString(wire, "roomId");
  const authorId = expectNonEmptyString(wire, "userId");
  const data = expectRecord(wire["data"] ?? {}, "data");
  const rawClock = wire["vectorClock"];
  if (rawClock !== undefined && rawClock !== null && typeof rawClock !== "string") {
    throw new MalformedEventError("vectorClock: expected string");
  }
  const vectorClock = parseVectorClock(rawClock);
  const timestamp = expectIsoTimestamp(wire, "timestamp");
  const base = { roomId, authorId, vectorClock, timestamp };

  switch (kind) {
    case "nodeCreated":
    case "nodeUpdated": {
      const node = graphNodeFromJson(data["node"]);
      if (node.roomId !== roomId) {
        throw new MalformedEventError(`node ${node.id} belongs to room ${node.roomId}, event to ${roomId}`);
      }
      return { ...base, kind, payload: { node } };
    }
    case "nodeDeleted":
      return { ...base, kind, payload: { nodeId: expectNonEmptyString(data, "nodeId") } };
    case "leafGenerated":
      return {
        ...base,
        kind,
        payload: { nodeId: expectNonEmptyString(data, "nodeId"), leaf: leafFromJson(data["leaf"]) },
      };
    case "avatarMoved":
      return {
        ...base,
        kind,
        payload: {
          avatarId: expectNonEmptyString(data, "avatarId"),
          position: expectVec3(data["position"], "position"),
        },
      };
    case "avatarStateChanged":
      return {
        ...base,
        kind,
        payload: {
          avatarId: expectNonEmptyString(data, "avatarId"),
          state: expectOneOf(data, "state", AVATAR_ACTIVITIES),
          ...(data["energy"] !== undefined ? { energy: expectEnergy(data) } : {}),
        },
      };
    case "participantJoined":
      return { ...base, kind, payload: { avatar: avatarFromJson(data["avatar"]) } };
    case "participantLeft":
      return { ...base, kind, payload: { avatarId: expectNonEmptyString(data, "avatarId") } };
    case "consensusFormed":
      return {
        ...base,
        kind,
        payload: {
          nodeId: expectNonEmptyString(data, "nodeId"),
          participantIds: expectStringArray(data, "participantIds"),
        },
      };
    case "contentionResolved":
      return {
        ...base,
        kind,
        payload: {
          nodeId: expectNonEmptyString(data, "nodeId"),
          resolution: expectNonEmptyString(data, "resolution"),
        },
      };
    default: {
      const _exhaustive: never = kind;
      return _exhaustive;
    }
  }
}

export const jsonSyncEventCodec: WireCodec<SyncEvent, string> = {
  encode: (event) => JSON.stringify(syncEventToWire(event)),
  decode: (wire) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(wire);
    } catch (err) {
      throw new MalformedEventError(`invalid JSON: ${String(err)}`);
    }
    return syncEventFromWire(parsed);
  },
};

export const cborSyncEventCodec: WireCodec<SyncEvent, Uint8Array> = {
  encode: (event) => cborEncode(syncEventToWire(event)),
  decode: (wire) => {
    let parsed: unknown;
    try {
      parsed = cborDecode(wire);
    } catch (err) {
      throw new MalformedEventError(`invalid CBOR: ${String(err)}`);
    }
    return syncEventFromWire(parsed);
  },
};
