import {
  isNullIdentity,
  normalizeHandle,
  sameIdentity,
  type CapabilityGrant,
  type CiphertextHandle,
  type EncryptionEngine,
  type Grantee,
  type Identity,
} from "@cxt/shared";
import { InvalidViewerError } from "./errors.js";
import type { TrackerStore } from "./storage/tracker-store.js";

/**
 * Gates who may obtain plaintext for a ciphertext handle.
 *
 * Every grant method first authorizes at the engine and then returns the
 * grant without persisting it. Callers persist grants with `record` inside
 * the same transaction as the state change that makes them relevant, so a
 * failed operation leaves the grant relation untouched.
 *
 * The relation is append-only with set semantics. Grants are per handle:
 * when an account's total moves to a new handle, earlier grants stay valid
 * for the old handle only.
 */
export class CapabilityController {
  constructor(
    private readonly engine: EncryptionEngine,
    private readonly store: TrackerStore,
    readonly processor: Identity,
  ) {}

  /** Lets the tracker reuse `handle` as an operand in later accumulations. */
  async grantProcessingRights(handle: CiphertextHandle): Promise<CapabilityGrant> {
    await this.engine.grantProcessingAuthority(handle);
    return this.grant(handle, { kind: "system" });
  }

  async grantOwnerRights(handle: CiphertextHandle, owner: Identity): Promise<CapabilityGrant> {
    await this.engine.grantDecryptRights(handle, owner);
    return this.grant(handle, { kind: "identity", identity: owner });
  }

  async shareWith(
    owner: Identity,
    viewer: Identity,
    handle: CiphertextHandle,
  ): Promise<CapabilityGrant> {
    if (isNullIdentity(viewer)) {
      throw new InvalidViewerError("Viewer must not be the null identity");
    }
    if (sameIdentity(owner, viewer)) {
      throw new InvalidViewerError("Owner already holds decrypt-rights on its own total");
    }
    await this.engine.grantDecryptRights(handle, viewer);
    return this.grant(handle, { kind: "identity", identity: viewer });
  }

  /** There is no way back: a public handle stays public. */
  async makePublic(handle: CiphertextHandle): Promise<CapabilityGrant> {
    await this.engine.grantPublicDecrypt(handle);
    return this.grant(handle, { kind: "public" });
  }

  record(grants: CapabilityGrant[]): void {
    for (const grant of grants) {
      this.store.addGrant(grant);
    }
  }

  grantsOf(handle: CiphertextHandle): CapabilityGrant[] {
    return this.store.listGrants(handle);
  }

  isPublic(handle: CiphertextHandle): boolean {
    return this.grantsOf(handle).some((grant) => grant.grantee.kind === "public");
  }

  canDecrypt(handle: CiphertextHandle, identity: Identity): boolean {
    return this.grantsOf(handle).some((grant) => {
      if (grant.grantee.kind === "public") return true;
      if (grant.grantee.kind === "system") return sameIdentity(identity, this.processor);
      return sameIdentity(identity, grant.grantee.identity);
    });
  }

  private grant(handle: CiphertextHandle, grantee: Grantee): CapabilityGrant {
    return { handle: normalizeHandle(handle), grantee, grantedAt: new Date().toISOString() };
  }
}
