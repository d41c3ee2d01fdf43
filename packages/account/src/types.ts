/**
 * Account Types
 */

import { BastionError } from "@bastion/types";
import type {
  Address,
  CallDispatcher,
  Clock,
  ErrorDetails,
  InstalledModule,
  Logger,
  ModuleKind,
  Selector,
  SignatureVerifier,
  Timestamp,
  ValidationContext,
  ValidationId,
} from "@bastion/types";

export interface Account {
  readonly address: Address;

  /** The identity currently treated as the account's primary controller. */
  readonly rootAuthority: Address;

  /** Fixed at creation. */
  readonly emergencyRecoveryIdentity: Address;

  readonly lastActivityTime: Timestamp;
  readonly createdAt: Timestamp;
  readonly salt: string;
}

export interface CreateAccountParams {
  readonly rootAuthority: Address;
  readonly emergencyRecoveryIdentity: Address;
  readonly salt?: string | undefined;
}

/** Internal per-account aggregate. */
export interface AccountState {
  account: Account;
  modules: InstalledModule[];
  events: AccountEvent[];
}

export interface AccountCoreOptions {
  /** Defaults to the system clock. */
  readonly clock?: Clock | undefined;
  readonly dispatcher: CallDispatcher;

  /** Recovers signers for isValidSignature. */
  readonly verifier?: SignatureVerifier | undefined;

  /** Outer dispatcher allowed to submit root-validated operations. */
  readonly entryPoint?: Address | undefined;

  /** Seconds of inactivity before the emergency identity may act. Defaults to 30 days. */
  readonly emergencyDelay?: number | undefined;

  readonly logger?: Logger | undefined;
}

export interface ValidationManagerOptions {
  readonly verifier?: SignatureVerifier | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Everything ValidationManager needs to authorize one operation.
 */
export interface OperationContext extends ValidationContext {
  readonly entryPoint?: Address | undefined;
}

// =============================================================================
// Events
// =============================================================================

export type AccountEvent =
  | {
      readonly type: "account_created";
      readonly account: Address;
      readonly rootAuthority: Address;
      readonly emergencyRecoveryIdentity: Address;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "executed";
      readonly account: Address;
      readonly caller: Address;
      readonly target: Address;
      readonly selector: Selector;
      readonly value: bigint;
      readonly success: boolean;

      /** null when an executor module drove the call. */
      readonly validationId: ValidationId | null;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "module_installed" | "module_uninstalled";
      readonly account: Address;
      readonly kind: ModuleKind;
      readonly module: Address;
      readonly timestamp: Timestamp;
    }
  | {
      readonly type: "root_authority_changed" | "emergency_recovery";
      readonly account: Address;
      readonly previous: Address;
      readonly next: Address;
      readonly changedBy: Address;
      readonly timestamp: Timestamp;
    };

// =============================================================================
// Error
// =============================================================================

export type AccountErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_VALIDATOR"
  | "MODULE_STATE_ERROR"
  | "REENTRANT_CALL"
  | "RECOVERY_DELAY_NOT_PASSED"
  | "INVALID_CONFIG"
  | "ACCOUNT_NOT_FOUND"
  | "ACCOUNT_EXISTS";

export class AccountError extends BastionError {
  constructor(code: AccountErrorCode, message: string, details?: ErrorDetails) {
    super(code, message, details);
    this.name = "AccountError";
  }
}
