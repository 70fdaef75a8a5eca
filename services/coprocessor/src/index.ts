export * from "./coprocessor.js";
export * from "./storage/ciphertext-store.js";
export { buildServer } from "./server.js";
