/**
 * @bastion/delegation
 *
 * Time-bound, capability-scoped delegation of account authority.
 */

export { DelegationRegistry, DEFAULT_MIN_DURATION, DEFAULT_MAX_DURATION } from "./delegation-registry.js";
export { DelegationError } from "./types.js";
export type {
  CreateDelegationParams,
  Delegation,
  DelegationErrorCode,
  DelegationEvent,
  DelegationKind,
  DelegationRegistryOptions,
  DelegationStatus,
} from "./types.js";
