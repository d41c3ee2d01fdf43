/**
 * Error Taxonomy
 *
 * Every rejected call surfaces as a thrown BastionError (or a package
 * subclass) with a machine-checkable code. Codes are grouped into
 * categories that tell the caller whether waiting, new input, or a
 * different caller could change the outcome.
 */

// =============================================================================
// Codes
// =============================================================================

export type ErrorCategory =
  | "authorization"
  | "temporal"
  | "quota"
  | "configuration"
  | "state";

export type BastionErrorCode =
  // authorization
  | "UNAUTHORIZED"
  | "INVALID_VALIDATOR"
  | "MODULE_STATE_ERROR"
  | "INVALID_SIGNATURE"
  | "REENTRANT_CALL"
  // temporal
  | "DELEGATION_EXPIRED"
  | "RECOVERY_DELAY_NOT_PASSED"
  // quota
  | "SPENDING_LIMIT_EXCEEDED"
  // configuration
  | "INVALID_CONFIG"
  | "INVALID_DURATION"
  | "INVALID_DELEGATEE"
  // state
  | "DELEGATION_ALREADY_EXISTS"
  | "DELEGATION_NOT_FOUND"
  | "DELEGATION_NOT_ACTIVE"
  | "RECOVERY_ALREADY_INITIATED"
  | "NO_RECOVERY_REQUEST"
  | "ALREADY_APPROVED"
  | "INSUFFICIENT_APPROVALS"
  | "ACCOUNT_IS_PAUSED"
  | "ACCOUNT_NOT_FOUND"
  | "ACCOUNT_EXISTS";

const CATEGORY_BY_CODE: Readonly<Record<BastionErrorCode, ErrorCategory>> = {
  UNAUTHORIZED: "authorization",
  INVALID_VALIDATOR: "authorization",
  MODULE_STATE_ERROR: "authorization",
  INVALID_SIGNATURE: "authorization",
  REENTRANT_CALL: "authorization",
  DELEGATION_EXPIRED: "temporal",
  RECOVERY_DELAY_NOT_PASSED: "temporal",
  SPENDING_LIMIT_EXCEEDED: "quota",
  INVALID_CONFIG: "configuration",
  INVALID_DURATION: "configuration",
  INVALID_DELEGATEE: "configuration",
  DELEGATION_ALREADY_EXISTS: "state",
  DELEGATION_NOT_FOUND: "state",
  DELEGATION_NOT_ACTIVE: "state",
  RECOVERY_ALREADY_INITIATED: "state",
  NO_RECOVERY_REQUEST: "state",
  ALREADY_APPROVED: "state",
  INSUFFICIENT_APPROVALS: "state",
  ACCOUNT_IS_PAUSED: "state",
  ACCOUNT_NOT_FOUND: "state",
  ACCOUNT_EXISTS: "state",
} as const;

export function categoryOf(code: BastionErrorCode): ErrorCategory {
  return CATEGORY_BY_CODE[code];
}

// =============================================================================
// Error
// =============================================================================

export type ErrorDetails = Readonly<Record<string, unknown>>;

/**
 * Structured error shared by all packages.
 * Always thrown, never returned as a value.
 */
export class BastionError extends Error {
  public readonly code: BastionErrorCode;
  public readonly category: ErrorCategory;
  public readonly details: ErrorDetails | undefined;

  constructor(code: BastionErrorCode, message: string, details?: ErrorDetails) {
    super(message);
    this.name = "BastionError";
    this.code = code;
    this.category = categoryOf(code);
    this.details = details;
  }
}

export function isBastionError(value: unknown): value is BastionError {
  return value instanceof BastionError;
}

/**
 * True when `value` is a BastionError carrying `code`.
 */
export function hasErrorCode(value: unknown, code: BastionErrorCode): boolean {
  return isBastionError(value) && value.code === code;
}
