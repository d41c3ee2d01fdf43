/**
 * Content addressing.
 *
 * RFC 8785 (JCS) canonical JSON, then SHA-256. Same value → same digest,
 * regardless of key order. Bigints must be converted to decimal strings
 * by the caller, since JSON has no bigint.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Address, Hex32 } from "./identifiers.js";

export type CanonicalValue =
  | string
  | number
  | boolean
  | null
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

export function canonicalDigest(value: CanonicalValue): Hex32 {
  const hex = createHash("sha256").update(canonicalize(value)).digest("hex");
  return `0x${hex}`;
}

/**
 * Derive a 20-byte identity from canonical content (last 20 bytes of the digest).
 */
export function canonicalAddress(value: CanonicalValue): Address {
  const digest = canonicalDigest(value);
  return `0x${digest.slice(-40)}`;
}
