import { timingSafeEqual } from "node:crypto";

const BEARER_PATTERN = /^Bearer\s+(\S+)$/i;

export function bearerToken(header: string | undefined): string | undefined {
  return header === undefined ? undefined : BEARER_PATTERN.exec(header.trim())?.[1];
}

// The hook token is compared in constant time; a length mismatch rejects early.
export function isHookAuthorized(header: string | undefined, expectedToken: string): boolean {
  const presented = bearerToken(header);
  if (presented === undefined) {
    return false;
  }
  const actual = Buffer.from(presented);
  const expected = Buffer.from(expectedToken);
  return actual.length === expected.length && timingSafeEqual(actual, expected);
}
