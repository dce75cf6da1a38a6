export * from "./types.js";
export * from "./codec.js";
export * from "./eventid.js";
export * from "./transport.js";
export * from "./replica.js";
export * from "./offline-queue.js";
export * from "./engine.js";
export * from "./in-memory.js";
