import * as ed from "@noble/ed25519";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";

export async function signHex(hashHex: string, privateKeyHex: string): Promise<string> {
  const sig = await ed.signAsync(hexToBytes(hashHex), hexToBytes(privateKeyHex));
  return bytesToHex(sig);
}

/**
 * Returns false for malformed hex or wrong-length signatures instead of throwing,
 * so callers can treat every bad proof the same way.
 */
export async function verifyHex(hashHex: string, signatureHex: string, publicKeyHex: string): Promise<boolean> {
  try {
    return await ed.verifyAsync(hexToBytes(signatureHex), hexToBytes(hashHex), hexToBytes(publicKeyHex));
  } catch {
    return false;
  }
}

export async function publicKeyFromPrivateKeyHex(privateKeyHex: string): Promise<string> {
  return bytesToHex(await ed.getPublicKeyAsync(hexToBytes(privateKeyHex)));
}

export function randomPrivateKeyHex(): string {
  return bytesToHex(ed.utils.randomPrivateKey());
}
