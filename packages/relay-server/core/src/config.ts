import type { RelayServerOptions } from "./server.js";

export type RelayEnv = Record<string, string | undefined>;

function numberFromEnv(env: RelayEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`invalid ${name}: ${raw}`);
  return value;
}

export function relayOptionsFromEnv(env: RelayEnv): RelayServerOptions {
  const port = numberFromEnv(env, "PORT", 8787);
  const backlog = numberFromEnv(env, "HELIXGRAPH_BACKLOG", 256);
  const maxPayloadBytes = numberFromEnv(env, "HELIXGRAPH_MAX_PAYLOAD_BYTES", 1024 * 1024);

  if (!Number.isInteger(port) || port <= 0) throw new Error(`invalid PORT: ${env.PORT}`);
  if (!Number.isInteger(backlog) || backlog < 0) throw new Error(`invalid HELIXGRAPH_BACKLOG: ${env.HELIXGRAPH_BACKLOG}`);
  if (maxPayloadBytes <= 0) {
    throw new Error(`invalid HELIXGRAPH_MAX_PAYLOAD_BYTES: ${env.HELIXGRAPH_MAX_PAYLOAD_BYTES}`);
  }

  return {
    host: env.HOST ?? "0.0.0.0",
    port,
    syncPath: env.HELIXGRAPH_RELAY_PATH ?? "/sync",
    backlog,
    maxPayloadBytes,
    debug: env.HELIXGRAPH_DEBUG === "1",
  };
}
