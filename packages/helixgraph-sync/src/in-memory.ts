import { createMemoryKeyValueStore } from "@helixgraph/interface";
import type { AuthorId, KeyValueStore, RoomId } from "@helixgraph/interface";

import { jsonSyncEventCodec } from "./codec.js";
import type { RoomLayout, SyncEngineOptions } from "./engine.js";
import { SyncEngine } from "./engine.js";
import { OfflineQueue } from "./offline-queue.js";
import type { DuplexTransport } from "./transport.js";
import { createDuplexEventTransport } from "./transport.js";

export type InMemoryBus<M> = {
  connect(isOnline: () => boolean): DuplexTransport<M>;
};

/**
 * Broadcast medium: whatever one connection sends reaches every other connection that is online at
 * delivery time. Offline connections miss it, like a dropped socket would.
 */
export function createInMemoryBus<M>(): InMemoryBus<M> {
  const members = new Set<{ handlers: Set<(msg: M) => void>; isOnline: () => boolean }>();

  return {
    connect(isOnline) {
      const self = { handlers: new Set<(msg: M) => void>(), isOnline };
      members.add(self);
      return {
        async send(msg) {
          if (!isOnline()) throw new Error("offline");
          queueMicrotask(() => {
            for (const member of members) {
              if (member === self || !member.isOnline()) continue;
              for (const h of member.handlers) h(msg);
            }
          });
        },
        onMessage(handler) {
          self.handlers.add(handler);
          return () => self.handlers.delete(handler);
        },
      };
    },
  };
}

export type InMemoryReplica = {
  engine: SyncEngine;
  queue: OfflineQueue;
  store: KeyValueStore;
  setOnline: (online: boolean) => void;
};

export type InMemoryRoom = {
  replicas: Map<AuthorId, InMemoryReplica>;
  replica: (authorId: AuthorId) => InMemoryReplica;
  /** Let queued deliveries land and every apply chain drain. */
  settle: () => Promise<void>;
  close: () => Promise<void>;
};

export async function createInMemoryRoom(opts: {
  roomId: RoomId;
  authors: readonly AuthorId[];
  layout: RoomLayout;
  engineOptions?: Omit<SyncEngineOptions, "roomId" | "authorId" | "transport" | "queue" | "layout">;
  stores?: ReadonlyMap<AuthorId, KeyValueStore>;
}): Promise<InMemoryRoom> {
  const bus = createInMemoryBus<string>();
  const replicas = new Map<AuthorId, InMemoryReplica>();

  for (const authorId of opts.authors) {
    let online = true;
    const isOnline = () => online;
    const store = opts.stores?.get(authorId) ?? createMemoryKeyValueStore();
    const queue = await OfflineQueue.open(store, opts.engineOptions?.log ? { log: opts.engineOptions.log } : {});
    const transport = createDuplexEventTransport(bus.connect(isOnline), jsonSyncEventCodec, {
      isOnline,
      label: `bus:${authorId}`,
    });
    const engine = new SyncEngine({
      ...opts.engineOptions,
      roomId: opts.roomId,
      authorId,
      transport,
      queue,
      layout: opts.layout,
    });
    replicas.set(authorId, {
      engine,
      queue,
      store,
      setOnline: (next) => {
        online = next;
      },
    });
  }

  const engines = () => Array.from(replicas.values(), (r) => r.engine);

  return {
    replicas,
    replica(authorId) {
      const found = replicas.get(authorId);
      if (!found) throw new Error(`unknown replica: ${authorId}`);
      return found;
    },
    async settle() {
      for (let round = 0; round < 4; round += 1) {
        await new Promise<void>((resolve) => setTimeout(resolve, 0));
        await Promise.all(engines().map((engine) => engine.flush()));
      }
    },
    async close() {
      await Promise.all(engines().map((engine) => engine.close()));
    },
  };
}
