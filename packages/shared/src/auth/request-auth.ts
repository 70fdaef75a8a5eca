import { parseIdentity, type Identity } from "../types/identity.js";

export const SERVICE_AUTH_HEADER = "x-service-token";
export const CALLER_IDENTITY_HEADER = "x-caller-identity";

export function normalizeServiceAuthToken(token: string | undefined | null): string | null {
  if (typeof token !== "string") return null;
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function buildServiceAuthHeaders(
  token: string | undefined | null,
): Record<string, string> {
  const normalized = normalizeServiceAuthToken(token);
  if (!normalized) return {};
  return { [SERVICE_AUTH_HEADER]: normalized };
}

/** No configured token means the gate is open (local development). */
export function isServiceAuthAuthorized(
  providedHeader: unknown,
  expectedToken: string | undefined | null,
): boolean {
  const expected = normalizeServiceAuthToken(expectedToken);
  if (!expected) return true;

  if (Array.isArray(providedHeader)) {
    return providedHeader.some((value) => value === expected);
  }
  return typeof providedHeader === "string" && providedHeader === expected;
}

/**
 * Reads the authenticated caller forwarded by the transport layer.
 * Repeated headers resolve to the first string value.
 */
export function parseCallerIdentityHeader(value: unknown): Identity | null {
  if (Array.isArray(value)) {
    const first = value.find((item) => typeof item === "string");
    return parseIdentity(first);
  }
  return parseIdentity(value);
}

export function buildCallerHeaders(identity: Identity): Record<string, string> {
  return { [CALLER_IDENTITY_HEADER]: identity };
}
