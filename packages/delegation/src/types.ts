/**
 * Delegation Types
 *
 * A delegation is a time-bound, capability-scoped grant of authority
 * from a delegator to a delegatee identity.
 *
 * Rules:
 * - spentAmount ≤ spendingLimit whenever spendingLimit > 0
 * - status is "active" only while now ≤ endTime
 * - allowedSelectors is non-empty iff kind is "limited"
 * - A delegatee is a reference only; it gains nothing of the delegator's state
 */

import { BastionError } from "@bastion/types";
import type {
  Address,
  Clock,
  DelegationKind,
  ErrorDetails,
  ExecutionHost,
  Hex32,
  Logger,
  Selector,
  SignatureVerifier,
  Timestamp,
} from "@bastion/types";

export type { DelegationKind };

export type DelegationStatus = "inactive" | "active" | "revoked" | "expired";

export interface Delegation {
  readonly id: Hex32;
  readonly delegator: Address;
  readonly delegatee: Address;
  readonly kind: DelegationKind;
  readonly status: DelegationStatus;
  readonly startTime: Timestamp;
  readonly endTime: Timestamp;

  /** 0n means unlimited. */
  readonly spendingLimit: bigint;
  readonly spentAmount: bigint;

  readonly allowedSelectors: readonly Selector[];

  /** Registry-wide creation sequence number that fed the id. */
  readonly sequence: number;
}

export interface CreateDelegationParams {
  readonly delegatee: Address;
  readonly kind: DelegationKind;

  /** Lifetime in seconds, starting now. */
  readonly duration: number;

  readonly spendingLimit?: bigint | undefined;
  readonly allowedSelectors?: readonly Selector[] | undefined;
}

export interface DelegationRegistryOptions {
  readonly address: Address;
  /** Defaults to the system clock. */
  readonly clock?: Clock | undefined;

  /** Account core that executes calls for executor-kind delegations. */
  readonly host?: ExecutionHost | undefined;

  /** Needed for signed creation and delegated signature checks. */
  readonly verifier?: SignatureVerifier | undefined;

  /** Seconds. Defaults to one hour. */
  readonly minDuration?: number | undefined;

  /** Seconds. Defaults to 365 days. */
  readonly maxDuration?: number | undefined;

  /** Identities allowed to revoke any delegation. */
  readonly admins?: readonly Address[] | undefined;

  readonly logger?: Logger | undefined;
}

// =============================================================================
// Events
// =============================================================================

export type DelegationEvent =
  | DelegationCreatedEvent
  | DelegationUsedEvent
  | DelegationRevokedEvent
  | DelegationExpiredEvent
  | AdminChangedEvent;

export interface DelegationCreatedEvent {
  readonly type: "delegation_created";
  readonly id: Hex32;
  readonly delegator: Address;
  readonly delegatee: Address;
  readonly kind: DelegationKind;
  readonly endTime: Timestamp;
  readonly timestamp: Timestamp;
}

export interface DelegationUsedEvent {
  readonly type: "delegation_used";
  readonly id: Hex32;
  readonly amount: bigint;
  readonly spentAmount: bigint;
  readonly timestamp: Timestamp;
}

export interface DelegationRevokedEvent {
  readonly type: "delegation_revoked";
  readonly id: Hex32;
  readonly revokedBy: Address;
  readonly timestamp: Timestamp;
}

export interface DelegationExpiredEvent {
  readonly type: "delegation_expired";
  readonly id: Hex32;
  readonly timestamp: Timestamp;
}

export interface AdminChangedEvent {
  readonly type: "admin_changed";
  readonly admin: Address;
  readonly granted: boolean;
  readonly timestamp: Timestamp;
}

// =============================================================================
// Error
// =============================================================================

export type DelegationErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_SIGNATURE"
  | "INVALID_CONFIG"
  | "INVALID_DURATION"
  | "INVALID_DELEGATEE"
  | "DELEGATION_ALREADY_EXISTS"
  | "DELEGATION_NOT_FOUND"
  | "DELEGATION_NOT_ACTIVE"
  | "DELEGATION_EXPIRED"
  | "SPENDING_LIMIT_EXCEEDED"
  | "MODULE_STATE_ERROR";

export class DelegationError extends BastionError {
  constructor(code: DelegationErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "DelegationError";
  }
}
