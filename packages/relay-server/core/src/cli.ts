import { relayOptionsFromEnv } from "./config.js";
import { startRelayServer } from "./server.js";

async function main() {
  const opts = relayOptionsFromEnv(process.env);
  const handle = await startRelayServer(opts);
  const base = `${handle.host}:${handle.port}`;
  console.log(`Helix relay listening on http://${base}`);
  console.log(`- health: http://${base}/health`);
  console.log(`- ws: ws://${base}${opts.syncPath ?? "/sync"}?roomId=YOUR_ROOM_ID`);

  const shutdown = () => {
    handle.close().catch((err: unknown) => {
      console.error(err);
      process.exitCode = 1;
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
