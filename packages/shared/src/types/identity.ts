import { ZeroAddress, ZeroHash, getAddress, isAddress, isHexString } from "ethers";

/** Checksummed 20-byte address of a principal. */
export type Identity = string;

/** `0x`-prefixed 32-byte reference to an encrypted u64 held by the engine. */
export type CiphertextHandle = string;

/** Hex-encoded integrity proof accompanying an externally encrypted input. */
export type IntegrityProof = string;

export const NULL_IDENTITY: Identity = ZeroAddress;

/** "No value yet". The engine never issues this handle. */
export const NULL_HANDLE: CiphertextHandle = ZeroHash;

export function parseIdentity(value: unknown): Identity | null {
  if (typeof value !== "string") return null;
  const trimmed = value.trim();
  if (!isAddress(trimmed)) return null;
  return getAddress(trimmed);
}

export function isNullIdentity(identity: Identity): boolean {
  return identity.toLowerCase() === NULL_IDENTITY;
}

export function sameIdentity(a: Identity, b: Identity): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

export function isCiphertextHandle(value: unknown): value is CiphertextHandle {
  return typeof value === "string" && isHexString(value, 32);
}

export function normalizeHandle(handle: CiphertextHandle): CiphertextHandle {
  return handle.toLowerCase();
}

export function isNullHandle(handle: CiphertextHandle): boolean {
  return normalizeHandle(handle) === NULL_HANDLE;
}
