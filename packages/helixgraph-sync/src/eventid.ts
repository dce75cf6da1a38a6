import { blake3 } from "@noble/hashes/blake3";
import { concatBytes, utf8ToBytes } from "@noble/hashes/utils";

import { bytesToHex } from "@helixgraph/interface";

import { syncEventToWire } from "./codec.js";
import type { SyncEvent } from "./types.js";

export const EVENT_ID_WIDTH_BYTES = 16;
const EVENT_ID_DOMAIN = utf8ToBytes("helixgraph/event/v0");

/**
 * Content address of an event (16 bytes, hex):
 * `blake3("helixgraph/event/v0" || utf8(JSON(wire)))[0..16]`
 *
 * The wire form lists keys in a fixed order and sorts node sets, so two replicas that hold the same
 * event derive the same id.
 */
export function deriveEventId(event: SyncEvent): string {
  const body = utf8ToBytes(JSON.stringify(syncEventToWire(event)));
  return bytesToHex(blake3(concatBytes(EVENT_ID_DOMAIN, body)).slice(0, EVENT_ID_WIDTH_BYTES));
}
