import type { CiphertextHandle, Identity } from "./identity.js";

export type AuditEventType =
  | "CONTRIBUTION_ACCEPTED"
  | "TOTAL_MADE_PUBLIC"
  | "TOTAL_SHARED";

export interface AuditEventBase {
  type: AuditEventType;
  sequence: number;     // strictly increasing across the whole log
  eventId: string;
  occurredAt: string;   // ISO date
}

export interface ContributionAcceptedEvent extends AuditEventBase {
  type: "CONTRIBUTION_ACCEPTED";
  identity: Identity;
  contributionHandle: CiphertextHandle;  // audit only, carries no decrypt-right
  newTotalHandle: CiphertextHandle;
}

export interface TotalMadePublicEvent extends AuditEventBase {
  type: "TOTAL_MADE_PUBLIC";
  identity: Identity;
  handle: CiphertextHandle;
}

export interface TotalSharedEvent extends AuditEventBase {
  type: "TOTAL_SHARED";
  owner: Identity;
  viewer: Identity;
  handle: CiphertextHandle;
}

export type AuditEvent = ContributionAcceptedEvent | TotalMadePublicEvent | TotalSharedEvent;

/** The principal an event is filed under; shares are filed under the owner. */
export function auditSubject(event: AuditEvent): Identity {
  return event.type === "TOTAL_SHARED" ? event.owner : event.identity;
}
