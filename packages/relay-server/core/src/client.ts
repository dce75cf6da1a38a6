import WebSocket from "ws";

import type { DuplexTransport } from "@helixgraph/sync";

export function rawDataToText(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}

/**
 * Text frames over a socket; sends fail unless the socket is open. Frames that arrive before the
 * first listener attaches (a relay replays its backlog right after the upgrade) are held for it.
 */
export function createWebSocketDuplex(ws: WebSocket): DuplexTransport<string> {
  const handlers = new Set<(frame: string) => void>();
  const early: string[] = [];
  ws.on("message", (data) => {
    const frame = rawDataToText(data);
    if (handlers.size === 0) {
      early.push(frame);
      return;
    }
    for (const h of handlers) h(frame);
  });

  return {
    send: (frame) =>
      new Promise<void>((resolve, reject) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new Error(`socket is not open (readyState ${ws.readyState})`));
          return;
        }
        ws.send(frame, (err) => (err ? reject(err) : resolve()));
      }),
    onMessage: (handler) => {
      handlers.add(handler);
      for (const frame of early.splice(0)) handler(frame);
      return () => {
        handlers.delete(handler);
      };
    },
  };
}

export type RelayConnection = {
  socket: WebSocket;
  duplex: DuplexTransport<string>;
  isOnline: () => boolean;
  close: () => Promise<void>;
};

export function relayUrl(baseUrl: string, roomId: string, syncPath = "/sync"): string {
  const url = new URL(syncPath, baseUrl);
  url.searchParams.set("roomId", roomId);
  return url.toString();
}

export async function connectRelay(url: string): Promise<RelayConnection> {
  const socket = new WebSocket(url);
  const duplex = createWebSocketDuplex(socket);
  await new Promise<void>((resolve, reject) => {
    socket.once("open", () => resolve());
    socket.once("error", reject);
  });

  return {
    socket,
    duplex,
    isOnline: () => socket.readyState === WebSocket.OPEN,
    close: () =>
      new Promise<void>((resolve) => {
        if (socket.readyState === WebSocket.CLOSED) {
          resolve();
          return;
        }
        socket.once("close", () => resolve());
        socket.close();
      }),
  };
}
