export * from "./hub.js";
export * from "./server.js";
export * from "./client.js";
export * from "./config.js";
