/**
 * Module Capability Interfaces
 *
 * Pluggable modules are installed per account under one of three
 * kinds. Each kind has its own capability interface; the account holds
 * opaque handles tagged by kind and never inherits from a module.
 *
 * Also defines the narrow ports modules use to talk back to the
 * account core, so module packages never depend on it directly.
 */

import type { Address, Hex, Hex32, ValidationId } from "./identifiers.js";
import type { Call, ExecutionResult } from "./operation.js";

// =============================================================================
// Module kinds
// =============================================================================

export type ModuleKind = "validator" | "executor" | "hook";

export interface Module {
  /** Identity of the module; also the caller identity it acts under. */
  readonly address: Address;
  readonly name: string;

  isModuleType(kind: ModuleKind): boolean;

  /** Called once when installed on `account`. Throwing aborts the install. */
  onInstall(account: Address, initData: unknown): void;

  /** Called once when uninstalled from `account`. Throwing aborts the uninstall. */
  onUninstall(account: Address, deinitData: unknown): void;
}

/**
 * Everything a validator needs to decide on one operation.
 */
export interface ValidationContext {
  readonly account: Address;
  readonly rootAuthority: Address;
  readonly caller: Address;
  readonly call: Call;
  readonly validationId: ValidationId;
  readonly delegationId?: Hex32 | undefined;
  readonly signature?: Hex | undefined;
}

export interface ValidatorModule extends Module {
  /** Returns true to authorize. May throw a more specific error. */
  validateOperation(account: Address, context: ValidationContext): boolean;
  isValidSignature(account: Address, hash: Hex32, signature: Hex): boolean;
}

/**
 * Executors act through ExecutionHost.executeFromExecutor;
 * the account needs nothing from them beyond the base protocol.
 */
export type ExecutorModule = Module;

/** Opaque value handed from a hook's preCheck to its postCheck. */
export interface HookToken {
  readonly module: Address;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface HookModule extends Module {
  preCheck(account: Address, caller: Address, value: bigint, call: Call): HookToken;
  postCheck(account: Address, token: HookToken): void;
}

/**
 * An installed module, tagged by the capability it was installed for.
 */
export type InstalledModule =
  | { readonly kind: "validator"; readonly module: ValidatorModule }
  | { readonly kind: "executor"; readonly module: ExecutorModule }
  | { readonly kind: "hook"; readonly module: HookModule };

// =============================================================================
// Ports
// =============================================================================

export type DelegationKind = "full" | "executor" | "validator" | "limited";

/**
 * Read-only view of active delegations, used to bridge root signature
 * checks to delegated signers.
 */
export interface DelegationLookup {
  hasDelegation(
    delegator: Address,
    delegatee: Address,
    kinds?: readonly DelegationKind[],
  ): boolean;
}

/**
 * Recovers the identity that produced `signature` over `digest`.
 * The concrete scheme lives outside this repository.
 */
export interface SignatureVerifier {
  recover(digest: Hex32, signature: Hex): Address | undefined;
}

/**
 * What recovery modules may do to an account.
 */
export interface AccountController {
  getRootAuthority(account: Address): Address;
  setRootAuthority(caller: Address, account: Address, newRootAuthority: Address): void;
}

/**
 * What executor modules may do to an account.
 */
export interface ExecutionHost {
  getRootAuthority(account: Address): Address;
  executeFromExecutor(caller: Address, account: Address, call: Call): ExecutionResult;
}

/** Restores the state captured by a checkpoint. */
export type Rollback = () => void;

/**
 * A component whose state can be captured and restored, so an
 * operation spanning several components reverts as a unit.
 */
export interface Revertible {
  checkpoint(): Rollback;
}

// =============================================================================
// Guards
// =============================================================================

export function isValidatorModule(module: Module): module is ValidatorModule {
  return (
    "validateOperation" in module &&
    typeof module.validateOperation === "function" &&
    "isValidSignature" in module &&
    typeof module.isValidSignature === "function"
  );
}

export function isHookModule(module: Module): module is HookModule {
  return (
    "preCheck" in module &&
    typeof module.preCheck === "function" &&
    "postCheck" in module &&
    typeof module.postCheck === "function"
  );
}

export function isRevertible(value: object): value is Revertible {
  return "checkpoint" in value && typeof value.checkpoint === "function";
}

export function isDelegationLookup(value: object): value is DelegationLookup {
  return "hasDelegation" in value && typeof value.hasDelegation === "function";
}
