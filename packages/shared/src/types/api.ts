import type { CapabilityGrant } from "./capability.js";
import type {
  AuditEvent,
  ContributionAcceptedEvent,
  TotalMadePublicEvent,
  TotalSharedEvent,
} from "./events.js";
import type { CiphertextHandle, Identity, IntegrityProof } from "./identity.js";

// Coprocessor

export interface EncryptInputRequest {
  value: string;        // decimal u64
  owner: Identity;
  verifier: Identity;   // processor allowed to consume the input
}

export interface EncryptInputResponse {
  handle: CiphertextHandle;
  proof: IntegrityProof;
}

export interface VerifyInputRequest {
  handle: CiphertextHandle;
  proof: IntegrityProof;
  owner: Identity;
  processor: Identity;
}

export interface EncryptZeroRequest {
  processor: Identity;
}

export interface AddCiphertextsRequest {
  a: CiphertextHandle;
  b: CiphertextHandle;
  processor: Identity;
}

export interface CiphertextResponse {
  handle: CiphertextHandle;
}

export interface GrantAccessRequest {
  handle: CiphertextHandle;
  grantee: Identity;
  processor: Identity;  // must itself hold authority on the handle
}

export interface GrantPublicRequest {
  handle: CiphertextHandle;
  processor: Identity;
}

export interface HandleAcl {
  handle: CiphertextHandle;
  grantees: Identity[];
  public: boolean;
}

export interface AclResponse {
  acl: HandleAcl;
}

export interface DecryptRequest {
  handle: CiphertextHandle;
}

export interface DecryptResponse {
  handle: CiphertextHandle;
  value: string;        // decimal u64
}

// Expense tracker

export interface SubmitContributionRequest {
  contribution: CiphertextHandle;
  proof: IntegrityProof;
}

export interface SubmitContributionResponse {
  identity: Identity;
  handle: CiphertextHandle;
  event: ContributionAcceptedEvent;
}

export interface TotalHandleResponse {
  identity: Identity;
  handle: CiphertextHandle;
  hasTotal: boolean;
}

export interface MakeTotalPublicResponse {
  identity: Identity;
  handle: CiphertextHandle;
  event: TotalMadePublicEvent;
}

export interface ShareTotalRequest {
  viewer: string;
}

export interface ShareTotalResponse {
  owner: Identity;
  viewer: Identity;
  handle: CiphertextHandle;
  event: TotalSharedEvent;
}

export interface ListAuditEventsResponse {
  events: AuditEvent[];
}

export interface GetCapabilitiesResponse {
  handle: CiphertextHandle;
  public: boolean;
  grants: CapabilityGrant[];
}

export interface TrackerInfoResponse {
  service: "expense-tracker";
  processor: Identity;
  nullHandle: CiphertextHandle;
}
