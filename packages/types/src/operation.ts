/**
 * Operation Types
 *
 * An operation is what the outer dispatcher hands to the account:
 * one call plus the validator it claims to satisfy.
 */

import type { Address, Hex, Hex32, Selector, ValidationId } from "./identifiers.js";

/**
 * Decoded call arguments. Addresses are strings; amounts are bigints.
 */
export type CallArg = string | bigint | boolean;

export interface CallData {
  readonly selector: Selector;
  readonly args: readonly CallArg[];
}

/**
 * A single effect on an external target.
 */
export interface Call {
  readonly target: Address;
  readonly value: bigint;
  readonly data: CallData;
}

export interface Operation {
  readonly call: Call;

  /** Which validator the operation intends to satisfy. */
  readonly validationId: ValidationId;

  /** Delegation backing the operation (delegated validation only). */
  readonly delegationId?: Hex32 | undefined;

  /** Detached authorization data for the chosen validator. */
  readonly signature?: Hex | undefined;
}

export interface ExecutionResult {
  readonly success: boolean;
  readonly returnData?: unknown;
  readonly error?: string | undefined;
}

/**
 * Performs the effect of a call on the world outside the account
 * (token transfers, protocol calls). Reports failure by value.
 */
export interface CallDispatcher {
  dispatch(account: Address, call: Call): ExecutionResult;
}
