/**
 * Outflow decoding and lazy period evaluation.
 *
 * Pure functions: no state, no clock reads. The hook composes them.
 */

import { NATIVE_ASSET } from "@bastion/types";
import type { Call, Selector, Timestamp } from "@bastion/types";
import { SpendingLimitError } from "./types.js";
import type { DecodedSpend, SpendingLimitConfig } from "./types.js";

/** transfer(address,uint256) */
export const TRANSFER_SELECTOR: Selector = "0xa9059cbb";

/** approve(address,uint256) */
export const APPROVE_SELECTOR: Selector = "0x095ea7b3";

/** transferFrom(address,address,uint256) */
export const TRANSFER_FROM_SELECTOR: Selector = "0x23b872dd";

/** Index of the amount argument for each token-moving selector. */
const AMOUNT_ARG_INDEX: ReadonlyMap<Selector, number> = new Map([
  [TRANSFER_SELECTOR, 1],
  [APPROVE_SELECTOR, 1],
  [TRANSFER_FROM_SELECTOR, 2],
]);

/**
 * Decode every asset outflow a call would cause.
 *
 * - Attached value → native asset outflow
 * - Token transfer/approve/transferFrom → outflow of the target token
 */
export function decodeSpends(call: Call, value: bigint): readonly DecodedSpend[] {
  const spends: DecodedSpend[] = [];

  if (value > 0n) {
    spends.push({ asset: NATIVE_ASSET, amount: value });
  }

  const amountIndex = AMOUNT_ARG_INDEX.get(call.data.selector);
  if (amountIndex !== undefined) {
    const amount = call.data.args[amountIndex];
    if (typeof amount !== "bigint" || amount < 0n) {
      throw new SpendingLimitError(
        "INVALID_CONFIG",
        `Malformed token payload for selector ${call.data.selector}: argument ${amountIndex} must be a non-negative amount`,
      );
    }
    if (amount > 0n) {
      spends.push({ asset: call.target, amount });
    }
  }

  return spends;
}

/**
 * The config as it stands at `now`: a single reset once the period
 * has elapsed, however many periods that is.
 */
export function effectiveConfig(
  config: SpendingLimitConfig,
  now: Timestamp,
): SpendingLimitConfig {
  if (now >= config.periodStart + config.periodLength) {
    return { ...config, spent: 0n, periodStart: now };
  }
  return config;
}

export function periodElapsed(config: SpendingLimitConfig, now: Timestamp): boolean {
  return now >= config.periodStart + config.periodLength;
}

export function remaining(config: SpendingLimitConfig): bigint {
  return config.limit > config.spent ? config.limit - config.spent : 0n;
}
