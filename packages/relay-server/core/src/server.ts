import http from "node:http";
import { randomUUID } from "node:crypto";

import WebSocket, { WebSocketServer } from "ws";

import type { RoomId } from "@helixgraph/interface";

import { rawDataToText } from "./client.js";
import { RoomHub } from "./hub.js";

export type RelayServerOptions = {
  host?: string;
  port?: number;
  syncPath?: string;
  healthPath?: string;
  maxPayloadBytes?: number;
  /** Frames kept per room for peers that join late. */
  backlog?: number;
  debug?: boolean;
  log?: (line: string) => void;
};

export type RelayServerHandle = {
  host: string;
  port: number;
  hub: RoomHub;
  close: () => Promise<void>;
};

export async function startRelayServer(opts: RelayServerOptions = {}): Promise<RelayServerHandle> {
  const host = opts.host ?? "0.0.0.0";
  const port = Number(opts.port ?? 8787);
  const syncPath = opts.syncPath ?? "/sync";
  const healthPath = opts.healthPath ?? "/health";
  const maxPayloadBytes = Number(opts.maxPayloadBytes ?? 1024 * 1024);
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.warn(line));

  if (!Number.isInteger(port) || port < 0) throw new Error(`invalid port: ${opts.port}`);
  if (!syncPath.startsWith("/")) throw new Error(`syncPath must start with "/": ${syncPath}`);
  if (!healthPath.startsWith("/")) throw new Error(`healthPath must start with "/": ${healthPath}`);
  if (!Number.isFinite(maxPayloadBytes) || maxPayloadBytes <= 0) {
    throw new Error(`invalid maxPayloadBytes: ${opts.maxPayloadBytes}`);
  }

  const hub = new RoomHub({ ...(opts.backlog !== undefined ? { backlog: opts.backlog } : {}), debug, log });

  const server = http.createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    if (url.pathname === healthPath) {
      res.writeHead(200, { "content-type": "text/plain" });
      res.end("ok");
      return;
    }

    res.writeHead(404, { "content-type": "text/plain" });
    res.end("not found");
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: maxPayloadBytes });

  const onConnection = (ws: WebSocket, roomId: RoomId) => {
    const peer = {
      id: randomUUID(),
      roomId,
      send: (frame: string) => {
        if (ws.readyState === WebSocket.OPEN) ws.send(frame);
      },
    };
    const leave = hub.join(peer);

    ws.on("message", (data) => {
      hub.publish(peer, rawDataToText(data));
    });

    let cleaned = false;
    const cleanup = () => {
      if (cleaned) return;
      cleaned = true;
      leave();
    };
    ws.once("close", cleanup);
    ws.once("error", (err) => {
      if (debug) log(`[relay:${roomId}] socket error for ${peer.id}: ${String(err)}`);
      cleanup();
    });
  };

  server.on("upgrade", (req, socket, head) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const roomId = url.searchParams.get("roomId")?.trim();
    if (url.pathname !== syncPath || !roomId) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => onConnection(ws, roomId));
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, resolve);
  });

  const address = server.address();
  const actualPort = typeof address === "object" && address ? address.port : port;

  const close = async (): Promise<void> => {
    for (const ws of wss.clients) ws.close(1001, "server shutting down");
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  };

  return { host, port: actualPort, hub, close };
}
