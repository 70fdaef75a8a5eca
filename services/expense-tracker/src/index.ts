export * from "./accumulator.js";
export * from "./capabilities.js";
export * from "./engine-client.js";
export * from "./errors.js";
export * from "./keyed-lock.js";
export * from "./storage/tracker-store.js";
export * from "./tracker.js";
export { buildServer } from "./server.js";
