/**
 * Identifier Types
 *
 * Address-like identifiers shared by every Bastion package.
 *
 * Rules:
 * - All identifiers are lowercase `0x`-prefixed hex strings
 * - The zero address is the null reference (never a valid authority)
 * - Normalisation happens at public boundaries; internal maps key on
 *   the normalised form only
 */

import { BastionError } from "./errors.js";

/** Any `0x`-prefixed hex string. */
export type Hex = `0x${string}`;

/**
 * A 20-byte account or module identity (`0x` + 40 hex chars).
 */
export type Address = `0x${string}`;

/**
 * A 32-byte identifier or digest (`0x` + 64 hex chars).
 */
export type Hex32 = `0x${string}`;

/**
 * A 4-byte operation selector (`0x` + 8 hex chars).
 */
export type Selector = `0x${string}`;

/**
 * A validation identifier: `0x00…00` for the root validator,
 * `0x01 ‖ module address` for an installed validator module.
 */
export type ValidationId = `0x${string}`;

export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/** Asset identifier for the chain's native value. */
export const NATIVE_ASSET: Address = ZERO_ADDRESS;

/** Reserved validation identifier of the root validator. */
export const ROOT_VALIDATION_ID: ValidationId = "0x000000000000000000000000000000000000000000";

/** Selector used for plain value transfers carrying no payload. */
export const EMPTY_SELECTOR: Selector = "0x00000000";

const ADDRESS_RE = /^0x[0-9a-f]{40}$/;
const HEX32_RE = /^0x[0-9a-f]{64}$/;
const SELECTOR_RE = /^0x[0-9a-f]{8}$/;
const VALIDATION_ID_RE = /^0x0[01][0-9a-f]{40}$/;

// =============================================================================
// Guards
// =============================================================================

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_RE.test(value);
}

export function isHex32(value: unknown): value is Hex32 {
  return typeof value === "string" && HEX32_RE.test(value);
}

export function isSelector(value: unknown): value is Selector {
  return typeof value === "string" && SELECTOR_RE.test(value);
}

export function isValidationId(value: unknown): value is ValidationId {
  return typeof value === "string" && VALIDATION_ID_RE.test(value);
}

export function isZeroAddress(value: Address): boolean {
  return value === ZERO_ADDRESS;
}

// =============================================================================
// Normalisation
// =============================================================================

/**
 * Lowercase and validate an address.
 *
 * @throws {BastionError} INVALID_CONFIG when the value is not 20 bytes of hex
 */
export function normalizeAddress(value: string): Address {
  const lower = value.toLowerCase();
  if (!isAddress(lower)) {
    throw new BastionError("INVALID_CONFIG", `Invalid address: "${value}"`);
  }
  return lower;
}

export function normalizeSelector(value: string): Selector {
  const lower = value.toLowerCase();
  if (!isSelector(lower)) {
    throw new BastionError("INVALID_CONFIG", `Invalid selector: "${value}"`);
  }
  return lower;
}

export function normalizeHex32(value: string): Hex32 {
  const lower = value.toLowerCase();
  if (!isHex32(lower)) {
    throw new BastionError("INVALID_CONFIG", `Invalid 32-byte identifier: "${value}"`);
  }
  return lower;
}

/**
 * Validation identifier under which a validator module is registered.
 */
export function validationIdOf(moduleAddress: Address): ValidationId {
  return `0x01${moduleAddress.slice(2)}`;
}
