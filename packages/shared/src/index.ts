export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./crypto/ed25519.js";
export * from "./auth/request-auth.js";
export * from "./types/identity.js";
export * from "./types/events.js";
export * from "./types/capability.js";
export * from "./types/api.js";
export * from "./engine/engine.js";
export * from "./engine/errors.js";
