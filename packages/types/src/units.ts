/**
 * Unit conversion between decimal strings and base-unit bigints.
 *
 * "1.5" with decimals=18 → 1500000000000000000n
 * 400000000000000000n with decimals=18 → "0.4"
 *
 * No floating-point operations anywhere.
 */

import { BastionError } from "./errors.js";

export function parseUnits(amount: string, decimals: number): bigint {
  assertDecimals(decimals);
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new BastionError("INVALID_CONFIG", `Invalid amount format: "${amount}"`);
  }

  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  if (fracPart.length > decimals) {
    throw new BastionError(
      "INVALID_CONFIG",
      `Amount "${trimmed}" has ${fracPart.length} decimal places, but only ${decimals} are allowed`,
    );
  }

  return BigInt(intPart + fracPart.padEnd(decimals, "0"));
}

export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);
  if (value < 0n) {
    throw new BastionError("INVALID_CONFIG", `Cannot format negative amount: ${value}`);
  }
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals).replace(/0+$/, "");

  return `${intPart}.${fracPart === "" ? "0" : fracPart}`;
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > 36) {
    throw new BastionError("INVALID_CONFIG", `Invalid decimals: ${decimals}`);
  }
}
