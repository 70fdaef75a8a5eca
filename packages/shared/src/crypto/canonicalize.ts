import { canonicalize } from "json-canonicalize";

/**
 * Canonical JSON per RFC 8785 (JCS).
 * Input proofs are signed over the digest of this form, so both the
 * coprocessor and any verifier must agree on it byte for byte.
 */
export function canonicalJson(value: unknown): string {
  return canonicalize(value);
}
