/**
 * Shared test helpers for Bastion packages.
 */

import { expect } from "vitest";
import { isBastionError } from "../src/errors.js";
import type { BastionErrorCode } from "../src/errors.js";
import type { Address, Hex, Hex32 } from "../src/identifiers.js";
import type { SignatureVerifier } from "../src/module.js";

/**
 * Deterministic test address: `addr(1)` → 0x000…0001.
 */
export function addr(n: number): Address {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

/**
 * Run `fn`, expecting it to throw a BastionError with `code`.
 * Returns the error for further assertions.
 */
export function expectCode(fn: () => unknown, code: BastionErrorCode): Error {
  let thrown: unknown;
  try {
    fn();
  } catch (e) {
    thrown = e;
  }
  expect(isBastionError(thrown)).toBe(true);
  if (!isBastionError(thrown)) {
    throw new Error(`Expected BastionError ${code}, got ${String(thrown)}`);
  }
  expect(thrown.code).toBe(code);
  return thrown;
}

/**
 * In-memory signature scheme: `sign` hands out an opaque signature that
 * `recover` maps back to its signer, but only for the digest it signed.
 */
export class FakeVerifier implements SignatureVerifier {
  private readonly signatures = new Map<Hex, { digest: Hex32; signer: Address }>();

  sign(signer: Address, digest: Hex32): Hex {
    const signature: Hex = `0x${(this.signatures.size + 1).toString(16).padStart(8, "0")}`;
    this.signatures.set(signature, { digest, signer });
    return signature;
  }

  recover(digest: Hex32, signature: Hex): Address | undefined {
    const entry = this.signatures.get(signature);
    return entry !== undefined && entry.digest === digest ? entry.signer : undefined;
  }
}
