import type { CiphertextHandle, Identity, IntegrityProof } from "../types/identity.js";

/** Encrypted u64 as the engine hands it to a processor. Never mutated. */
export interface InternalCiphertext {
  readonly type: "euint64";
  readonly handle: CiphertextHandle;
}

/**
 * Homomorphic engine as seen by one processing identity.
 *
 * Every call either fully succeeds or throws an EngineError; callers never
 * observe partial results.
 */
export interface EncryptionEngine {
  /** Checks that `proof` binds `externalCiphertext` to `caller` and this processor. */
  verifyAndDecode(
    externalCiphertext: CiphertextHandle,
    proof: IntegrityProof,
    caller: Identity,
  ): Promise<InternalCiphertext>;
  encryptZero(): Promise<InternalCiphertext>;
  add(a: InternalCiphertext, b: InternalCiphertext): Promise<InternalCiphertext>;
  toExternalHandle(value: InternalCiphertext): CiphertextHandle;
  grantProcessingAuthority(handle: CiphertextHandle): Promise<void>;
  grantDecryptRights(handle: CiphertextHandle, identity: Identity): Promise<void>;
  grantPublicDecrypt(handle: CiphertextHandle): Promise<void>;
}

export function internalCiphertext(handle: CiphertextHandle): InternalCiphertext {
  return { type: "euint64", handle };
}
