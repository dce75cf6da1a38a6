import type { EventTransport, SendResult, SyncEvent, Unsubscribe } from "./types.js";

export interface DuplexTransport<M> {
  send(msg: M): Promise<void>;
  onMessage(handler: (msg: M) => void): Unsubscribe;
}

export type WireCodec<Message, Wire> = {
  encode(message: Message): Wire;
  decode(wire: Wire): Message;
};

export type DuplexEventTransportOptions = {
  /** Defaults to always online. */
  isOnline?: () => boolean;
  debug?: boolean;
  log?: (line: string) => void;
  label?: string;
};

/**
 * Adapts a wire-level duplex (a socket, an in-memory bus connection) into the engine's event transport.
 *
 * Failures to hand a frame to the duplex are transport failures and get retried later. An event the
 * codec cannot encode is rejected outright. The duplex is read from the first `onEvent` on; incoming
 * frames that fail to decode are dropped.
 */
export function createDuplexEventTransport<Wire>(
  duplex: DuplexTransport<Wire>,
  codec: WireCodec<SyncEvent, Wire>,
  opts: DuplexEventTransportOptions = {}
): EventTransport & { close: () => void } {
  const isOnline = opts.isOnline ?? (() => true);
  const debug = Boolean(opts.debug);
  const log = opts.log ?? ((line) => console.debug(line));
  const label = opts.label ?? "transport";
  const handlers = new Set<(event: SyncEvent) => void>();

  let detach: Unsubscribe | undefined;

  const onWire = (wire: Wire) => {
    let event: SyncEvent;
    try {
      event = codec.decode(wire);
    } catch (err) {
      if (debug) log(`[${label}] decode error: ${String(err)}`);
      return;
    }
    for (const h of handlers) h(event);
  };

  return {
    async send(event): Promise<SendResult> {
      if (!isOnline()) return { ok: false, reason: "transport", error: new Error("offline") };
      let wire: Wire;
      try {
        wire = codec.encode(event);
      } catch (err) {
        return { ok: false, reason: "rejected", message: String(err) };
      }
      try {
        await duplex.send(wire);
        return { ok: true };
      } catch (err) {
        if (debug) log(`[${label}] send failed: ${String(err)}`);
        return { ok: false, reason: "transport", error: err };
      }
    },
    onEvent(handler) {
      handlers.add(handler);
      if (!detach) detach = duplex.onMessage(onWire);
      return () => {
        handlers.delete(handler);
      };
    },
    isOnline,
    close() {
      handlers.clear();
      detach?.();
      detach = undefined;
    },
  };
}
