import {
  InvalidProofError,
  NULL_HANDLE,
  internalCiphertext,
  type CapabilityGrant,
  type CiphertextHandle,
  type ContributionAcceptedEvent,
  type EncryptionEngine,
  type Identity,
  type IntegrityProof,
} from "@cxt/shared";
import { newEventId } from "./audit.js";
import type { CapabilityController } from "./capabilities.js";
import type { KeyedLock } from "./keyed-lock.js";
import type { AccountState, TrackerStore } from "./storage/tracker-store.js";

/** Engine work for one accumulation, done but not yet committed. */
interface PreparedAccumulation {
  contributionHandle: CiphertextHandle;
  account: AccountState;
  grants: CapabilityGrant[];
}

export interface AcceptedContribution {
  account: AccountState;
  event: ContributionAcceptedEvent;
}

function isEmptyProof(proof: IntegrityProof): boolean {
  const trimmed = proof.trim();
  return trimmed.length === 0 || trimmed === "0x";
}

/** Per-identity encrypted running totals. */
export class AccumulatorStore {
  constructor(
    private readonly engine: EncryptionEngine,
    private readonly store: TrackerStore,
    private readonly capabilities: CapabilityController,
    private readonly locks: KeyedLock,
  ) {}

  account(who: Identity): AccountState | null {
    return this.store.getAccount(who);
  }

  readHandle(who: Identity): CiphertextHandle {
    return this.store.getAccount(who)?.total ?? NULL_HANDLE;
  }

  async accumulate(
    caller: Identity,
    contribution: CiphertextHandle,
    proof: IntegrityProof,
  ): Promise<CiphertextHandle> {
    const accepted = await this.accept(caller, contribution, proof);
    return accepted.account.total;
  }

  /**
   * Folds a verified contribution into the caller's total. Runs under the
   * caller's lock; the account, its grants and the CONTRIBUTION_ACCEPTED
   * event are written in one transaction, and nothing is written on failure.
   */
  accept(
    caller: Identity,
    contribution: CiphertextHandle,
    proof: IntegrityProof,
  ): Promise<AcceptedContribution> {
    return this.locks.run(caller.toLowerCase(), async () => {
      const prepared = await this.prepare(caller, contribution, proof);
      return this.store.atomically(() => {
        this.capabilities.record(prepared.grants);
        this.store.putAccount(prepared.account);
        const event: ContributionAcceptedEvent = {
          type: "CONTRIBUTION_ACCEPTED",
          sequence: this.store.nextSequence(),
          eventId: newEventId(),
          occurredAt: prepared.account.updatedAt,
          identity: caller,
          contributionHandle: prepared.contributionHandle,
          newTotalHandle: prepared.account.total,
        };
        this.store.appendEvent(event);
        return { account: prepared.account, event };
      });
    });
  }

  private async prepare(
    caller: Identity,
    contribution: CiphertextHandle,
    proof: IntegrityProof,
  ): Promise<PreparedAccumulation> {
    if (isEmptyProof(proof)) {
      throw new InvalidProofError("Integrity proof is empty");
    }
    const validated = await this.engine.verifyAndDecode(contribution, proof, caller);

    const existing = this.store.getAccount(caller);
    const current = existing
      ? internalCiphertext(existing.total)
      : await this.engine.encryptZero();
    const newTotal = this.engine.toExternalHandle(await this.engine.add(current, validated));

    // Processing authority first: the owner grant is issued under it.
    const grants = [
      await this.capabilities.grantProcessingRights(newTotal),
      await this.capabilities.grantOwnerRights(newTotal, caller),
    ];

    return {
      contributionHandle: this.engine.toExternalHandle(validated),
      account: {
        identity: caller,
        total: newTotal,
        hasTotal: true,
        contributions: (existing?.contributions ?? 0) + 1,
        updatedAt: new Date().toISOString(),
      },
      grants,
    };
  }
}
