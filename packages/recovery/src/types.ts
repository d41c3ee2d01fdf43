/**
 * Guardian Recovery Types
 */

import { BastionError } from "@bastion/types";
import type { AccountController, Address, Clock, ErrorDetails, Logger, Timestamp } from "@bastion/types";

export interface GuardianConfig {
  readonly guardians: readonly Address[];

  /** Approvals needed; 2 ≤ threshold ≤ guardians.length. */
  readonly threshold: number;

  /** Seconds between initiation and earliest execution. */
  readonly recoveryDelay: number;
}

export interface RecoveryRequest {
  readonly newRootAuthority: Address;
  readonly initiator: Address;
  readonly initiatedAt: Timestamp;
  readonly approvals: readonly Address[];
  readonly approvalCount: number;
}

export interface AccountRecoveryState {
  config: GuardianConfig;
  request: RecoveryRequest | undefined;
}

export interface GuardianRecoveryOptions {
  readonly address: Address;
  /** Defaults to the system clock. */
  readonly clock?: Clock | undefined;
  readonly controller: AccountController;

  /** Used when init data names no delay. Defaults to 48 hours. */
  readonly defaultRecoveryDelay?: number | undefined;

  readonly logger?: Logger | undefined;
}

// =============================================================================
// Events
// =============================================================================

export type RecoveryEvent =
  | {
      readonly type: "recovery_initiated";
      readonly account: Address;
      readonly initiator: Address;
      readonly newRootAuthority: Address;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "recovery_approved";
      readonly account: Address;
      readonly guardian: Address;
      readonly approvalCount: number;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "recovery_cancelled";
      readonly account: Address;
      readonly cancelledBy: Address;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "recovery_executed";
      readonly account: Address;
      readonly newRootAuthority: Address;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "guardians_changed";
      readonly account: Address;
      readonly guardians: readonly Address[];
      readonly threshold: number;
      readonly recoveryDelay: number;
      readonly timestamp: Timestamp;
    };

// =============================================================================
// Error
// =============================================================================

export type RecoveryErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_VALIDATOR"
  | "INVALID_CONFIG"
  | "MODULE_STATE_ERROR"
  | "RECOVERY_ALREADY_INITIATED"
  | "NO_RECOVERY_REQUEST"
  | "ALREADY_APPROVED"
  | "RECOVERY_DELAY_NOT_PASSED"
  | "INSUFFICIENT_APPROVALS";

export class RecoveryError extends BastionError {
  constructor(code: RecoveryErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "RecoveryError";
  }
}
