/**
 * Validation Manager — resolves which validator governs an operation.
 *
 * Each account maps validation ids to installed validator modules.
 * The root id is reserved: it means "the account's root authority".
 * An operation names exactly one validator; there is no fallback from
 * one to the other.
 */

import {
  ROOT_VALIDATION_ID,
  componentLogger,
  isDelegationLookup,
  validationIdOf,
} from "@bastion/types";
import type {
  Address,
  DelegationKind,
  Hex,
  Hex32,
  Logger,
  Module,
  Revertible,
  Rollback,
  SignatureVerifier,
  ValidationId,
  ValidatorModule,
} from "@bastion/types";
import { AccountError } from "./types.js";
import type { OperationContext, ValidationManagerOptions } from "./types.js";

/** Delegation kinds whose holders may sign for the root authority. */
export const ROOT_SIGNING_KINDS: readonly DelegationKind[] = ["full", "executor"];

export class ValidationManager implements Revertible {
  private validators: Map<Address, Map<ValidationId, ValidatorModule>> = new Map();
  private readonly verifier: SignatureVerifier | undefined;
  private readonly logger: Logger;

  constructor(options: ValidationManagerOptions = {}) {
    this.verifier = options.verifier;
    this.logger = componentLogger("ValidationManager", options.logger);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Registration
  // ───────────────────────────────────────────────────────────────────────

  register(account: Address, module: ValidatorModule): ValidationId {
    const id = validationIdOf(module.address);
    const forAccount = this.validators.get(account) ?? new Map<ValidationId, ValidatorModule>();
    if (forAccount.has(id)) {
      throw new AccountError("MODULE_STATE_ERROR", `Validator ${module.address} already registered for ${account}`);
    }
    forAccount.set(id, module);
    this.validators.set(account, forAccount);
    return id;
  }

  unregister(account: Address, module: ValidatorModule): void {
    const id = validationIdOf(module.address);
    if (this.validators.get(account)?.delete(id) !== true) {
      throw new AccountError("MODULE_STATE_ERROR", `Validator ${module.address} not registered for ${account}`);
    }
  }

  getValidator(account: Address, validationId: ValidationId): ValidatorModule | undefined {
    return this.validators.get(account)?.get(validationId);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Authorization
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Authorize an operation or throw.
   *
   * @throws {AccountError} INVALID_VALIDATOR when the named validator is
   *   ambiguous or unknown, UNAUTHORIZED when it rejects
   */
  validate(context: OperationContext): void {
    if (context.validationId === ROOT_VALIDATION_ID) {
      this.validateRoot(context);
      return;
    }

    const module = this.getValidator(context.account, context.validationId);
    if (module === undefined) {
      throw new AccountError(
        "INVALID_VALIDATOR",
        `No validator ${context.validationId} installed on ${context.account}`,
        { account: context.account, validationId: context.validationId },
      );
    }
    if (!module.validateOperation(context.account, context)) {
      this.logger.debug(
        { account: context.account, caller: context.caller, validator: module.name },
        "Rejected by validator",
      );
      throw new AccountError(
        "UNAUTHORIZED",
        `${module.name} rejected operation from ${context.caller}`,
        { account: context.account, caller: context.caller, validationId: context.validationId },
      );
    }
  }

  /**
   * Check a signature against the account's chosen validator.
   *
   * The root case also accepts signers holding an active full or
   * executor delegation from the root authority, as reported by any of
   * `modules` (by default the account's registered validators).
   */
  isValidSignature(
    account: Address,
    rootAuthority: Address,
    hash: Hex32,
    signature: Hex,
    validationId: ValidationId = ROOT_VALIDATION_ID,
    modules: readonly Module[] = [...(this.validators.get(account)?.values() ?? [])],
  ): boolean {
    if (validationId !== ROOT_VALIDATION_ID) {
      return this.getValidator(account, validationId)?.isValidSignature(account, hash, signature) ?? false;
    }

    const signer = this.verifier?.recover(hash, signature);
    if (signer === undefined) {
      return false;
    }
    if (signer === rootAuthority) {
      return true;
    }
    for (const module of modules) {
      if (isDelegationLookup(module) && module.hasDelegation(rootAuthority, signer, ROOT_SIGNING_KINDS)) {
        return true;
      }
    }
    return false;
  }

  checkpoint(): Rollback {
    const validators = new Map(
      [...this.validators].map(
        ([account, ids]): [Address, Map<ValidationId, ValidatorModule>] => [account, new Map(ids)],
      ),
    );
    return () => {
      this.validators = validators;
    };
  }

  private validateRoot(context: OperationContext): void {
    if (context.delegationId !== undefined) {
      throw new AccountError(
        "INVALID_VALIDATOR",
        "A delegated operation must name the delegation validator, not the root",
        { account: context.account, delegationId: context.delegationId },
      );
    }
    const { caller } = context;
    if (caller !== context.rootAuthority && caller !== context.account && caller !== context.entryPoint) {
      this.logger.debug({ account: context.account, caller }, "Rejected: caller is not the root authority");
      throw new AccountError(
        "UNAUTHORIZED",
        `${caller} is not authorized on ${context.account}`,
        { account: context.account, caller },
      );
    }
  }
}
