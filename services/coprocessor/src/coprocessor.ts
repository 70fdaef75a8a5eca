import { hexlify, randomBytes } from "ethers";
import {
  AccessDeniedError,
  CiphertextNotFoundError,
  EngineOverflowError,
  InvalidProofError,
  digestOf,
  internalCiphertext,
  isNullHandle,
  normalizeHandle,
  publicKeyFromPrivateKeyHex,
  signHex,
  verifyHex,
  type CiphertextHandle,
  type EncryptInputResponse,
  type EncryptionEngine,
  type HandleAcl,
  type Identity,
  type IntegrityProof,
} from "@cxt/shared";
import type {
  CiphertextOrigin,
  CiphertextStore,
  StoredCiphertext,
} from "./storage/ciphertext-store.js";

export type OverflowPolicy = "trap" | "wrap";

export const U64_MODULUS = 1n << 64n;
export const U64_MAX = U64_MODULUS - 1n;

/** Who an encrypted input belongs to and which processor may consume it. */
export interface InputBinding {
  owner: Identity;
  verifier: Identity;
}

export interface CoprocessorOptions {
  store: CiphertextStore;
  signingKeyHex: string;
  overflowPolicy?: OverflowPolicy;
}

export function isOverflowPolicy(value: unknown): value is OverflowPolicy {
  return value === "trap" || value === "wrap";
}

export function isU64(value: bigint): boolean {
  return value >= 0n && value <= U64_MAX;
}

function proofDigest(handle: CiphertextHandle, binding: InputBinding): string {
  return digestOf({
    handle: normalizeHandle(handle),
    owner: binding.owner.toLowerCase(),
    verifier: binding.verifier.toLowerCase(),
  });
}

function stripHexPrefix(value: string): string {
  return value.startsWith("0x") ? value.slice(2) : value;
}

/**
 * Local stand-in for a homomorphic coprocessor.
 *
 * It keeps the plaintext of every handle (the trapdoor) so decryption
 * requests can be answered, and enforces the same ACL rules a real engine
 * would: processors need authority on operands, decryptors need a grant or a
 * public flag. Authority produced while a processor computes is transient: it
 * lasts only as long as this instance and ends once the handle is used as an
 * operand or the processor grants itself persistent authority. Each encrypted
 * input is accepted once.
 */
export class Coprocessor {
  private readonly transient = new Map<string, Set<CiphertextHandle>>();

  private constructor(
    private readonly store: CiphertextStore,
    private readonly signingKeyHex: string,
    readonly publicKeyHex: string,
    readonly overflowPolicy: OverflowPolicy,
  ) {}

  static async create(options: CoprocessorOptions): Promise<Coprocessor> {
    const publicKeyHex = await publicKeyFromPrivateKeyHex(options.signingKeyHex);
    return new Coprocessor(
      options.store,
      options.signingKeyHex,
      publicKeyHex,
      options.overflowPolicy ?? "trap",
    );
  }

  /** Client-side encryption of a contribution, bound to owner and verifier. */
  async encryptInput(value: bigint, binding: InputBinding): Promise<EncryptInputResponse> {
    if (!isU64(value)) {
      throw new RangeError(`Input ${value.toString()} is outside the u64 domain`);
    }
    const handle = this.mint(value, "input");
    const signature = await signHex(proofDigest(handle, binding), this.signingKeyHex);
    return { handle, proof: `0x${signature}` };
  }

  async verifyInput(
    handle: CiphertextHandle,
    proof: IntegrityProof,
    binding: InputBinding,
  ): Promise<CiphertextHandle> {
    if (stripHexPrefix(proof.trim()).length === 0) {
      throw new InvalidProofError("Integrity proof is empty");
    }
    const record = this.store.get(handle);
    if (!record || record.origin !== "input") {
      throw new InvalidProofError("Proof does not refer to a registered encrypted input");
    }
    if (record.consumedAt !== null) {
      throw new InvalidProofError("Encrypted input has already been consumed");
    }
    const valid = await verifyHex(
      proofDigest(record.handle, binding),
      stripHexPrefix(proof.trim()),
      this.publicKeyHex,
    );
    if (!valid) {
      throw new InvalidProofError("Proof does not attest this input for the caller and verifier");
    }
    if (!this.store.consumeInput(record.handle, new Date().toISOString())) {
      throw new InvalidProofError("Encrypted input has already been consumed");
    }
    this.allowTransient(record.handle, binding.verifier);
    return record.handle;
  }

  encryptZero(processor: Identity): CiphertextHandle {
    const handle = this.mint(0n, "trivial");
    this.allowTransient(handle, processor);
    return handle;
  }

  add(a: CiphertextHandle, b: CiphertextHandle, processor: Identity): CiphertextHandle {
    const left = this.requireAuthority(a, processor);
    const right = this.requireAuthority(b, processor);
    this.releaseTransient(left.handle, processor);
    this.releaseTransient(right.handle, processor);
    let sum = left.value + right.value;
    if (sum > U64_MAX) {
      if (this.overflowPolicy === "trap") {
        throw new EngineOverflowError();
      }
      sum %= U64_MODULUS;
    }
    const handle = this.mint(sum, "computed");
    this.allowTransient(handle, processor);
    return handle;
  }

  /**
   * Persistent grant, issued by a processor that itself holds authority.
   * A processor granting itself replaces its transient authority.
   */
  allow(handle: CiphertextHandle, grantee: Identity, processor: Identity): void {
    const record = this.requireAuthority(handle, processor);
    this.store.allow(record.handle, grantee, new Date().toISOString());
    if (grantee.toLowerCase() === processor.toLowerCase()) {
      this.releaseTransient(record.handle, processor);
    }
  }

  /** Irreversible: there is no operation that clears the public flag. */
  allowPublic(handle: CiphertextHandle, processor: Identity): void {
    const record = this.requireAuthority(handle, processor);
    this.store.markPublic(record.handle, new Date().toISOString());
  }

  acl(handle: CiphertextHandle): HandleAcl {
    this.requireCiphertext(handle);
    return this.store.acl(handle);
  }

  hasAuthority(handle: CiphertextHandle, identity: Identity): boolean {
    const normalized = normalizeHandle(handle);
    return (
      this.store.isAllowed(normalized, identity) ||
      (this.transient.get(identity.toLowerCase())?.has(normalized) ?? false)
    );
  }

  /** Handles `identity` may currently use only through in-memory authority. */
  transientAuthorityCount(identity: Identity): number {
    return this.transient.get(identity.toLowerCase())?.size ?? 0;
  }

  userDecrypt(handle: CiphertextHandle, requester: Identity): bigint {
    const record = this.requireCiphertext(handle);
    if (this.store.isPublic(record.handle) || this.store.isAllowed(record.handle, requester)) {
      return record.value;
    }
    throw new AccessDeniedError(`${requester} may not decrypt ${record.handle}`);
  }

  publicDecrypt(handle: CiphertextHandle): bigint {
    const record = this.requireCiphertext(handle);
    if (!this.store.isPublic(record.handle)) {
      throw new AccessDeniedError(`${record.handle} is not publicly decryptable`);
    }
    return record.value;
  }

  /** The engine as seen by one processing identity. */
  engineFor(processor: Identity): EncryptionEngine {
    return {
      verifyAndDecode: async (externalCiphertext, proof, caller) =>
        internalCiphertext(
          await this.verifyInput(externalCiphertext, proof, { owner: caller, verifier: processor }),
        ),
      encryptZero: async () => internalCiphertext(this.encryptZero(processor)),
      add: async (a, b) => internalCiphertext(this.add(a.handle, b.handle, processor)),
      toExternalHandle: (value) => value.handle,
      grantProcessingAuthority: async (handle) => this.allow(handle, processor, processor),
      grantDecryptRights: async (handle, identity) => this.allow(handle, identity, processor),
      grantPublicDecrypt: async (handle) => this.allowPublic(handle, processor),
    };
  }

  close(): void {
    this.store.close();
  }

  private mint(value: bigint, origin: CiphertextOrigin): CiphertextHandle {
    let handle = hexlify(randomBytes(32));
    while (isNullHandle(handle) || this.store.get(handle)) {
      handle = hexlify(randomBytes(32));
    }
    this.store.insert({
      handle,
      value,
      origin,
      createdAt: new Date().toISOString(),
      consumedAt: null,
    });
    return handle;
  }

  private allowTransient(handle: CiphertextHandle, processor: Identity): void {
    const key = processor.toLowerCase();
    const handles = this.transient.get(key) ?? new Set<CiphertextHandle>();
    handles.add(normalizeHandle(handle));
    this.transient.set(key, handles);
  }

  private releaseTransient(handle: CiphertextHandle, processor: Identity): void {
    const key = processor.toLowerCase();
    const handles = this.transient.get(key);
    if (!handles) return;
    handles.delete(normalizeHandle(handle));
    if (handles.size === 0) {
      this.transient.delete(key);
    }
  }

  private requireCiphertext(handle: CiphertextHandle): StoredCiphertext {
    const record = this.store.get(handle);
    if (!record) {
      throw new CiphertextNotFoundError(`Unknown ciphertext handle '${handle}'`);
    }
    return record;
  }

  private requireAuthority(handle: CiphertextHandle, processor: Identity): StoredCiphertext {
    const record = this.requireCiphertext(handle);
    if (!this.hasAuthority(record.handle, processor)) {
      throw new AccessDeniedError(`${processor} holds no processing authority on ${record.handle}`);
    }
    return record;
  }
}
