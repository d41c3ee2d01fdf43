/**
 * Zod schemas for module init data and other untrusted input.
 */

import { z } from "zod";
import { BastionError } from "./errors.js";
import { normalizeAddress } from "./identifiers.js";

export const AddressSchema = z
  .string()
  .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 20-byte hex address")
  .transform((value) => normalizeAddress(value));

/** Non-negative amount as a bigint or a base-10 string. */
export const AmountSchema = z.union([
  z.bigint().nonnegative(),
  z
    .string()
    .regex(/^\d+$/, "must be a base-10 integer string")
    .transform((value) => BigInt(value)),
]);

/** Positive whole number of seconds. */
export const SecondsSchema = z.number().int().positive();

/**
 * Parse untrusted input, converting schema failures into INVALID_CONFIG.
 */
export function parseWithSchema<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  context: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new BastionError("INVALID_CONFIG", `Invalid ${context}: ${issues}`);
  }
  return result.data;
}
