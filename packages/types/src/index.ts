/**
 * @bastion/types — Shared primitives for the Bastion engine.
 *
 * - Identifiers (addresses, selectors, validation ids) and guards
 * - Clock abstraction for lazy time evaluation
 * - Operation descriptors and the call dispatcher port
 * - Module capability interfaces and the ports modules call back through
 * - The error taxonomy every package throws
 * - Canonical hashing and unit conversion
 */

// Identifiers
export {
  ZERO_ADDRESS,
  NATIVE_ASSET,
  ROOT_VALIDATION_ID,
  EMPTY_SELECTOR,
  isAddress,
  isHex32,
  isSelector,
  isValidationId,
  isZeroAddress,
  normalizeAddress,
  normalizeSelector,
  normalizeHex32,
  validationIdOf,
} from "./identifiers.js";
export type { Hex, Address, Hex32, Selector, ValidationId } from "./identifiers.js";

// Clock
export { SystemClock, ManualClock, MINUTE, HOUR, DAY } from "./clock.js";
export type { Clock, Timestamp } from "./clock.js";

// Operations
export type {
  CallArg,
  CallData,
  Call,
  Operation,
  ExecutionResult,
  CallDispatcher,
} from "./operation.js";

// Modules and ports
export {
  isValidatorModule,
  isHookModule,
  isRevertible,
  isDelegationLookup,
} from "./module.js";
export type {
  ModuleKind,
  Module,
  ValidationContext,
  ValidatorModule,
  ExecutorModule,
  HookToken,
  HookModule,
  InstalledModule,
  DelegationKind,
  DelegationLookup,
  SignatureVerifier,
  AccountController,
  ExecutionHost,
  Rollback,
  Revertible,
} from "./module.js";

// Errors
export { BastionError, categoryOf, isBastionError, hasErrorCode } from "./errors.js";
export type { BastionErrorCode, ErrorCategory, ErrorDetails } from "./errors.js";

// Hashing and units
export { canonicalDigest, canonicalAddress } from "./hashing.js";
export type { CanonicalValue } from "./hashing.js";
export { parseUnits, formatUnits } from "./units.js";

// Schemas
export {
  AddressSchema,
  AmountSchema,
  SecondsSchema,
  parseWithSchema,
} from "./schemas.js";

// Logging
export { silentLogger, componentLogger } from "./logging.js";
export type { Logger } from "./logging.js";
