/**
 * Spending Limit Types
 *
 * Rules:
 * - Amounts are bigints in the asset's base units
 * - One config per (account, asset); the native asset is the zero address
 * - Period resets are lazy: evaluated on read and write, never scheduled
 * - spent ≤ limit holds for every enabled config
 */

import {
  BastionError,
  type AccountController,
  type Address,
  type Clock,
  type ErrorDetails,
  type Logger,
  type Timestamp,
} from "@bastion/types";

// =============================================================================
// Config
// =============================================================================

export interface SpendingLimitConfig {
  readonly asset: Address;

  /** Maximum outflow per period, base units. */
  readonly limit: bigint;

  /** Period length in seconds. */
  readonly periodLength: number;

  /** Outflow recorded in the current period. */
  readonly spent: bigint;

  /** Start of the current period. */
  readonly periodStart: Timestamp;

  readonly enabled: boolean;
}

/**
 * Everything the hook tracks for one account.
 */
export interface AccountSpendingState {
  readonly limits: Map<Address, SpendingLimitConfig>;
  readonly whitelist: Set<Address>;
  paused: boolean;
}

/**
 * A single (asset, amount) outflow decoded from a call.
 */
export interface DecodedSpend {
  readonly asset: Address;
  readonly amount: bigint;
}

export interface SpendingLimitHookOptions {
  readonly address: Address;
  /** Defaults to the system clock. */
  readonly clock?: Clock | undefined;
  /** Lets the account's root authority administer limits, not just the account. */
  readonly controller?: AccountController | undefined;
  readonly logger?: Logger | undefined;
}

// =============================================================================
// Events
// =============================================================================

export type SpendingLimitEvent =
  | LimitSetEvent
  | LimitRemovedEvent
  | SpendRecordedEvent
  | PeriodResetEvent
  | WhitelistUpdatedEvent
  | PauseChangedEvent;

export interface LimitSetEvent {
  readonly type: "limit_set";
  readonly account: Address;
  readonly asset: Address;
  readonly limit: bigint;
  readonly periodLength: number;
  readonly timestamp: Timestamp;
}

export interface LimitRemovedEvent {
  readonly type: "limit_removed";
  readonly account: Address;
  readonly asset: Address;
  readonly timestamp: Timestamp;
}

export interface SpendRecordedEvent {
  readonly type: "spend_recorded";
  readonly account: Address;
  readonly asset: Address;
  readonly amount: bigint;
  readonly spent: bigint;
  readonly timestamp: Timestamp;
}

export interface PeriodResetEvent {
  readonly type: "period_reset";
  readonly account: Address;
  readonly asset: Address;
  readonly timestamp: Timestamp;
}

export interface WhitelistUpdatedEvent {
  readonly type: "whitelist_updated";
  readonly account: Address;
  readonly address: Address;
  readonly allowed: boolean;
  readonly timestamp: Timestamp;
}

export interface PauseChangedEvent {
  readonly type: "pause_changed";
  readonly account: Address;
  readonly paused: boolean;
  readonly timestamp: Timestamp;
}

// =============================================================================
// Error
// =============================================================================

export type SpendingLimitErrorCode =
  | "SPENDING_LIMIT_EXCEEDED"
  | "ACCOUNT_IS_PAUSED"
  | "INVALID_CONFIG"
  | "MODULE_STATE_ERROR"
  | "UNAUTHORIZED";

export class SpendingLimitError extends BastionError {
  constructor(code: SpendingLimitErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "SpendingLimitError";
  }
}
