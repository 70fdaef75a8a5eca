import type { FastifyBaseLogger } from "fastify";
import {
  parseIdentity,
  type AuditEvent,
  type CapabilityGrant,
  type CiphertextHandle,
  type ContributionAcceptedEvent,
  type EncryptionEngine,
  type Identity,
  type IntegrityProof,
  type TotalMadePublicEvent,
  type TotalSharedEvent,
} from "@cxt/shared";
import { AccumulatorStore } from "./accumulator.js";
import { newEventId } from "./audit.js";
import { CapabilityController } from "./capabilities.js";
import { InvalidViewerError, NoTotalYetError } from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";
import type { AccountState, ListEventsFilter, TrackerStore } from "./storage/tracker-store.js";

export interface ExpenseTrackerOptions {
  engine: EncryptionEngine;
  store: TrackerStore;
  /** Identity the tracker computes under; receives processing authority on every total. */
  processor: Identity;
  logger?: FastifyBaseLogger;
}

export interface ContributionReceipt {
  handle: CiphertextHandle;
  event: ContributionAcceptedEvent;
}

export interface PublicationReceipt {
  handle: CiphertextHandle;
  event: TotalMadePublicEvent;
}

export interface ShareReceipt {
  viewer: Identity;
  handle: CiphertextHandle;
  event: TotalSharedEvent;
}

export class ExpenseTracker {
  readonly accumulator: AccumulatorStore;
  readonly capabilities: CapabilityController;
  readonly processor: Identity;
  private readonly store: TrackerStore;
  private readonly locks = new KeyedLock();
  private readonly logger?: FastifyBaseLogger;

  constructor(options: ExpenseTrackerOptions) {
    this.store = options.store;
    this.processor = options.processor;
    this.logger = options.logger;
    this.capabilities = new CapabilityController(options.engine, options.store, options.processor);
    this.accumulator = new AccumulatorStore(
      options.engine,
      options.store,
      this.capabilities,
      this.locks,
    );
  }

  async submitContribution(
    caller: Identity,
    contribution: CiphertextHandle,
    proof: IntegrityProof,
  ): Promise<ContributionReceipt> {
    const { account, event } = await this.accumulator.accept(caller, contribution, proof);
    this.logger?.info(
      { identity: caller, handle: account.total, contributions: account.contributions },
      "contribution accepted",
    );
    return { handle: account.total, event };
  }

  /** The caller's own handle; the route reads the caller from the request. */
  getMyTotalHandle(caller: Identity): CiphertextHandle {
    return this.accumulator.readHandle(caller);
  }

  /** Anyone may read anyone's handle; decrypting it is what the grants gate. */
  getTotalHandleOf(target: Identity): CiphertextHandle {
    return this.accumulator.readHandle(target);
  }

  makeTotalPublic(caller: Identity): Promise<PublicationReceipt> {
    return this.locks.run(caller.toLowerCase(), async () => {
      const account = this.requireAccount(caller);
      const grant = await this.capabilities.makePublic(account.total);
      const event = this.store.atomically(() => {
        this.capabilities.record([grant]);
        const published: TotalMadePublicEvent = {
          type: "TOTAL_MADE_PUBLIC",
          sequence: this.store.nextSequence(),
          eventId: newEventId(),
          occurredAt: grant.grantedAt,
          identity: caller,
          handle: account.total,
        };
        this.store.appendEvent(published);
        return published;
      });

      this.logger?.info({ identity: caller, handle: account.total }, "total made public");
      return { handle: account.total, event };
    });
  }

  /** Grants `viewer` the caller's current handle only; later totals need a new share. */
  shareTotal(caller: Identity, viewer: string): Promise<ShareReceipt> {
    return this.locks.run(caller.toLowerCase(), async () => {
      const account = this.requireAccount(caller);
      const viewerIdentity = parseIdentity(viewer);
      if (!viewerIdentity) {
        throw new InvalidViewerError(`'${viewer}' is not a valid identity`);
      }
      const grant = await this.capabilities.shareWith(caller, viewerIdentity, account.total);
      const event = this.store.atomically(() => {
        this.capabilities.record([grant]);
        const shared: TotalSharedEvent = {
          type: "TOTAL_SHARED",
          sequence: this.store.nextSequence(),
          eventId: newEventId(),
          occurredAt: grant.grantedAt,
          owner: caller,
          viewer: viewerIdentity,
          handle: account.total,
        };
        this.store.appendEvent(shared);
        return shared;
      });

      this.logger?.info(
        { owner: caller, viewer: viewerIdentity, handle: account.total },
        "total shared",
      );
      return { viewer: viewerIdentity, handle: account.total, event };
    });
  }

  account(identity: Identity): AccountState | null {
    return this.accumulator.account(identity);
  }

  listEvents(filter?: ListEventsFilter): AuditEvent[] {
    return this.store.listEvents(filter);
  }

  capabilitiesOf(handle: CiphertextHandle): CapabilityGrant[] {
    return this.capabilities.grantsOf(handle);
  }

  private requireAccount(identity: Identity): AccountState {
    const account = this.accumulator.account(identity);
    if (!account) {
      throw new NoTotalYetError(identity);
    }
    return account;
  }
}
