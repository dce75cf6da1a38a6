import { clockValue } from "@helixgraph/interface";
import type { AuthorId, KeyValueStore } from "@helixgraph/interface";

import { jsonSyncEventCodec } from "./codec.js";
import { deriveEventId } from "./eventid.js";
import type { QueuedEvent, SyncEvent } from "./types.js";

export type OfflineQueueOptions = {
  log?: (line: string) => void;
};

export function queueKey(event: SyncEvent): string {
  return `${String(Math.trunc(event.timestamp)).padStart(15, "0")}_${deriveEventId(event)}`;
}

function compareQueued(a: QueuedEvent, b: QueuedEvent): number {
  if (a.event.timestamp !== b.event.timestamp) return a.event.timestamp - b.event.timestamp;
  const ac = clockValue(a.event.vectorClock, a.event.authorId);
  const bc = clockValue(b.event.vectorClock, b.event.authorId);
  if (ac !== bc) return ac - bc;
  return a.key === b.key ? 0 : a.key < b.key ? -1 : 1;
}

/**
 * Durable FIFO of events that could not be delivered. Entries are written once and removed once;
 * nothing is rewritten in place, so a slow drain and a fresh enqueue never race on the same key.
 */
export class OfflineQueue {
  private readonly keys = new Set<string>();
  private readonly counters = new Map<AuthorId, number>();
  private readonly log: (line: string) => void;

  private constructor(
    private readonly store: KeyValueStore,
    opts: OfflineQueueOptions
  ) {
    this.log = opts.log ?? ((line) => console.warn(line));
  }

  /** Reads every stored entry once; malformed ones are dropped as in {@link drainPending}. */
  static async open(store: KeyValueStore, opts: OfflineQueueOptions = {}): Promise<OfflineQueue> {
    const queue = new OfflineQueue(store, opts);
    for (const entry of await queue.drainPending()) queue.noteCounter(entry.event);
    return queue;
  }

  pendingCount(): number {
    return this.keys.size;
  }

  /**
   * Highest counter `authorId` used in any event this queue has held since it opened, 0 if none.
   * An engine reopened over the same store starts its clock here.
   */
  lastCounter(authorId: AuthorId): number {
    return this.counters.get(authorId) ?? 0;
  }

  async enqueue(event: SyncEvent): Promise<QueuedEvent> {
    const key = queueKey(event);
    await this.store.put(key, jsonSyncEventCodec.encode(event));
    this.keys.add(key);
    this.noteCounter(event);
    return { key, event };
  }

  /**
   * Everything still pending, in creation order. Does not remove anything; call
   * {@link acknowledge} once an entry has been delivered. Entries that no longer decode are deleted.
   */
  async drainPending(): Promise<QueuedEvent[]> {
    const out: QueuedEvent[] = [];
    for (const [key, value] of await this.store.getAll()) {
      let event: SyncEvent;
      try {
        event = jsonSyncEventCodec.decode(value);
      } catch (err) {
        this.log(`[offline-queue] dropping malformed entry ${key}: ${String(err)}`);
        await this.store.delete(key);
        this.keys.delete(key);
        continue;
      }
      this.keys.add(key);
      out.push({ key, event });
    }
    return out.sort(compareQueued);
  }

  async acknowledge(entry: QueuedEvent): Promise<void> {
    await this.store.delete(entry.key);
    this.keys.delete(entry.key);
  }

  async clear(): Promise<void> {
    await this.store.clear();
    this.keys.clear();
  }

  private noteCounter(event: SyncEvent): void {
    const counter = clockValue(event.vectorClock, event.authorId);
    if (counter > this.lastCounter(event.authorId)) this.counters.set(event.authorId, counter);
  }

  async close(): Promise<void> {
    await this.store.close?.();
  }
}
