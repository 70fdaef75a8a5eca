import type { CiphertextHandle, Identity } from "./identity.js";

export type Grantee =
  | { kind: "system" }
  | { kind: "identity"; identity: Identity }
  | { kind: "public" };

export interface CapabilityGrant {
  handle: CiphertextHandle;
  grantee: Grantee;
  grantedAt: string;
}
