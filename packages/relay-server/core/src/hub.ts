import type { RoomId } from "@helixgraph/interface";
import { jsonSyncEventCodec } from "@helixgraph/sync";
import type { SyncEvent } from "@helixgraph/sync";

export type RelayPeer = {
  id: string;
  roomId: RoomId;
  send: (frame: string) => void;
};

export type PublishOutcome =
  | { type: "relayed"; event: SyncEvent; recipients: number }
  | { type: "malformed"; error: unknown }
  | { type: "room-mismatch"; roomId: RoomId };

export type RoomHubOptions = {
  /** Frames kept per room and replayed to late joiners. */
  backlog?: number;
  debug?: boolean;
  log?: (line: string) => void;
};

type Room = {
  peers: Map<string, RelayPeer>;
  backlog: string[];
};

/**
 * Message-level fan-out: each validated frame goes to every other peer in the sender's room. The
 * relay never interprets events beyond validating them; ordering and conflicts are the replicas'
 * business.
 */
export class RoomHub {
  private readonly rooms = new Map<RoomId, Room>();
  private readonly backlogSize: number;
  private readonly debug: boolean;
  private readonly log: (line: string) => void;

  constructor(opts: RoomHubOptions = {}) {
    const backlog = opts.backlog ?? 256;
    if (!Number.isInteger(backlog) || backlog < 0) throw new Error(`invalid backlog: ${opts.backlog}`);
    this.backlogSize = backlog;
    this.debug = Boolean(opts.debug);
    this.log = opts.log ?? ((line) => console.warn(line));
  }

  join(peer: RelayPeer): () => void {
    const room = this.room(peer.roomId);
    room.peers.set(peer.id, peer);
    for (const frame of room.backlog) peer.send(frame);
    if (this.debug) this.log(`[relay:${peer.roomId}] ${peer.id} joined, replayed ${room.backlog.length}`);

    return () => {
      room.peers.delete(peer.id);
      if (this.debug) this.log(`[relay:${peer.roomId}] ${peer.id} left`);
    };
  }

  publish(from: RelayPeer, frame: string): PublishOutcome {
    let event: SyncEvent;
    try {
      event = jsonSyncEventCodec.decode(frame);
    } catch (err) {
      this.log(`[relay:${from.roomId}] dropping malformed frame from ${from.id}: ${String(err)}`);
      return { type: "malformed", error: err };
    }
    if (event.roomId !== from.roomId) {
      this.log(`[relay:${from.roomId}] dropping frame for room ${event.roomId} from ${from.id}`);
      return { type: "room-mismatch", roomId: event.roomId };
    }

    const room = this.room(from.roomId);
    // Avatar moves are superseded quickly; replaying them to late joiners is noise.
    if (this.backlogSize > 0 && event.kind !== "avatarMoved") {
      room.backlog.push(frame);
      if (room.backlog.length > this.backlogSize) room.backlog.shift();
    }

    let recipients = 0;
    for (const peer of room.peers.values()) {
      if (peer.id === from.id) continue;
      peer.send(frame);
      recipients += 1;
    }
    return { type: "relayed", event, recipients };
  }

  peerCount(roomId: RoomId): number {
    return this.rooms.get(roomId)?.peers.size ?? 0;
  }

  backlog(roomId: RoomId): readonly string[] {
    return this.rooms.get(roomId)?.backlog ?? [];
  }

  private room(roomId: RoomId): Room {
    let room = this.rooms.get(roomId);
    if (!room) {
      room = { peers: new Map(), backlog: [] };
      this.rooms.set(roomId, room);
    }
    return room;
  }
}
