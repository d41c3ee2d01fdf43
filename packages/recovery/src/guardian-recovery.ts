/**
 * Guardian Recovery Validator — N-of-M social recovery of the root authority.
 *
 * Per account: NoRequest → Initiated → (approvals accrue) → Executed | Cancelled.
 *
 * Rules:
 * - At most one outstanding request per account
 * - Execution needs BOTH approvalCount ≥ threshold AND
 *   now ≥ initiatedAt + recoveryDelay; the delay gate is checked first
 * - Only the current root authority (or the account) cancels or
 *   manages guardians
 * - A single-guardian configuration is never valid
 */

import {
  AddressSchema,
  HOUR,
  SecondsSchema,
  SystemClock,
  componentLogger,
  isZeroAddress,
  normalizeAddress,
  parseWithSchema,
} from "@bastion/types";
import type {
  AccountController,
  Address,
  Clock,
  Hex,
  Hex32,
  Logger,
  ModuleKind,
  Revertible,
  Rollback,
  Timestamp,
  ValidationContext,
  ValidatorModule,
} from "@bastion/types";
import { z } from "zod";
import { RecoveryError } from "./types.js";
import type {
  AccountRecoveryState,
  GuardianConfig,
  GuardianRecoveryOptions,
  RecoveryEvent,
  RecoveryRequest,
} from "./types.js";

export const MIN_THRESHOLD = 2;
export const DEFAULT_RECOVERY_DELAY = 48 * HOUR;

export const GuardianRecoveryInitSchema = z
  .object({
    guardians: z.array(AddressSchema).min(MIN_THRESHOLD),
    threshold: z.number().int().min(MIN_THRESHOLD),
    recoveryDelay: SecondsSchema.optional(),
  })
  .superRefine((init, ctx) => {
    if (init.threshold > init.guardians.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["threshold"],
        message: `exceeds guardian count ${init.guardians.length}`,
      });
    }
    if (new Set(init.guardians).size !== init.guardians.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["guardians"], message: "contains duplicates" });
    }
    if (init.guardians.some(isZeroAddress)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["guardians"], message: "contains the zero address" });
    }
  });

export type GuardianRecoveryInitData = z.input<typeof GuardianRecoveryInitSchema>;

export class GuardianRecoveryValidator implements ValidatorModule, Revertible {
  public readonly address: Address;
  public readonly name = "GuardianRecoveryValidator";

  private accounts: Map<Address, AccountRecoveryState> = new Map();
  private readonly events: RecoveryEvent[] = [];
  private readonly clock: Clock;
  private readonly controller: AccountController;
  private readonly defaultRecoveryDelay: number;
  private readonly logger: Logger;

  constructor(options: GuardianRecoveryOptions) {
    this.address = normalizeAddress(options.address);
    this.clock = options.clock ?? new SystemClock();
    this.controller = options.controller;
    this.defaultRecoveryDelay = options.defaultRecoveryDelay ?? DEFAULT_RECOVERY_DELAY;
    this.logger = componentLogger(this.name, options.logger);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Module protocol
  // ───────────────────────────────────────────────────────────────────────

  isModuleType(kind: ModuleKind): boolean {
    return kind === "validator";
  }

  onInstall(account: Address, initData: unknown): void {
    const target = normalizeAddress(account);
    if (this.accounts.has(target)) {
      throw new RecoveryError("MODULE_STATE_ERROR", `${this.name} already initialized for ${target}`);
    }
    const init = parseWithSchema(GuardianRecoveryInitSchema, initData, `${this.name} init data`);
    const config: GuardianConfig = {
      guardians: init.guardians,
      threshold: init.threshold,
      recoveryDelay: init.recoveryDelay ?? this.defaultRecoveryDelay,
    };

    this.accounts.set(target, { config, request: undefined });
    this.emitConfig(target, config);
    this.logger.info(
      { account: target, guardians: config.guardians.length, threshold: config.threshold },
      "Guardian recovery installed",
    );
  }

  onUninstall(account: Address, _deinitData: unknown): void {
    const target = normalizeAddress(account);
    this.requireState(target);
    this.accounts.delete(target);
    this.logger.info({ account: target }, "Guardian recovery uninstalled");
  }

  /** Guardians authorize nothing but recovery itself. */
  validateOperation(_account: Address, _context: ValidationContext): boolean {
    return false;
  }

  isValidSignature(_account: Address, _hash: Hex32, _signature: Hex): boolean {
    return false;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Recovery workflow
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {RecoveryError} UNAUTHORIZED, INVALID_VALIDATOR, RECOVERY_ALREADY_INITIATED
   */
  initiateRecovery(caller: Address, account: Address, newRootAuthority: Address): RecoveryRequest {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    const guardian = this.requireGuardian(state, caller, target);
    const proposed = normalizeAddress(newRootAuthority);

    if (isZeroAddress(proposed)) {
      throw new RecoveryError("INVALID_VALIDATOR", "Proposed root authority cannot be the zero address");
    }
    if (state.request !== undefined) {
      throw new RecoveryError(
        "RECOVERY_ALREADY_INITIATED",
        `Recovery already initiated for ${target} at ${state.request.initiatedAt}`,
        { account: target, initiatedAt: state.request.initiatedAt },
      );
    }

    const now = this.clock.now();
    const request: RecoveryRequest = {
      newRootAuthority: proposed,
      initiator: guardian,
      initiatedAt: now,
      approvals: [],
      approvalCount: 0,
    };
    state.request = request;

    this.emit({ type: "recovery_initiated", account: target, initiator: guardian, newRootAuthority: proposed, timestamp: now });
    this.logger.info({ account: target, initiator: guardian, newRootAuthority: proposed }, "Recovery initiated");
    return request;
  }

  /**
   * @throws {RecoveryError} UNAUTHORIZED, NO_RECOVERY_REQUEST, ALREADY_APPROVED
   */
  approveRecovery(caller: Address, account: Address): RecoveryRequest {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    const guardian = this.requireGuardian(state, caller, target);
    const request = this.requireRequest(state, target);

    if (request.approvals.includes(guardian)) {
      throw new RecoveryError(
        "ALREADY_APPROVED",
        `Guardian ${guardian} already approved recovery for ${target}`,
        { account: target, guardian },
      );
    }

    const approved = withApprovals(request, [...request.approvals, guardian]);
    state.request = approved;

    this.emit({
      type: "recovery_approved",
      account: target,
      guardian,
      approvalCount: approved.approvalCount,
      timestamp: this.clock.now(),
    });
    this.logger.info({ account: target, guardian, approvalCount: approved.approvalCount }, "Recovery approved");
    return approved;
  }

  /**
   * Replace the account's root authority once both gates hold.
   * Anyone may trigger it.
   *
   * @throws {RecoveryError} NO_RECOVERY_REQUEST, RECOVERY_DELAY_NOT_PASSED, INSUFFICIENT_APPROVALS
   */
  executeRecovery(caller: Address, account: Address): Address {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    const request = this.requireRequest(state, target);
    const now = this.clock.now();

    const unlockAt = request.initiatedAt + state.config.recoveryDelay;
    if (now < unlockAt) {
      this.logger.debug({ account: target, unlockAt, now }, "Rejected: recovery delay not passed");
      throw new RecoveryError(
        "RECOVERY_DELAY_NOT_PASSED",
        `Recovery for ${target} unlocks at ${unlockAt}, now ${now}`,
        { account: target, unlockAt, now },
      );
    }
    if (request.approvalCount < state.config.threshold) {
      this.logger.debug(
        { account: target, approvals: request.approvalCount, threshold: state.config.threshold },
        "Rejected: insufficient approvals",
      );
      throw new RecoveryError(
        "INSUFFICIENT_APPROVALS",
        `Recovery for ${target} has ${request.approvalCount} of ${state.config.threshold} approvals`,
        { account: target, approvals: request.approvalCount, threshold: state.config.threshold },
      );
    }

    this.controller.setRootAuthority(this.address, target, request.newRootAuthority);
    state.request = undefined;

    this.emit({ type: "recovery_executed", account: target, newRootAuthority: request.newRootAuthority, timestamp: now });
    this.logger.info(
      { account: target, newRootAuthority: request.newRootAuthority, executedBy: caller },
      "Recovery executed",
    );
    return request.newRootAuthority;
  }

  /**
   * Discard the outstanding request and all its approvals.
   *
   * @throws {RecoveryError} UNAUTHORIZED, NO_RECOVERY_REQUEST
   */
  cancelRecovery(caller: Address, account: Address): void {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    const by = this.requireOwner(caller, target);
    this.requireRequest(state, target);

    state.request = undefined;
    this.emit({ type: "recovery_cancelled", account: target, cancelledBy: by, timestamp: this.clock.now() });
    this.logger.info({ account: target, cancelledBy: by }, "Recovery cancelled");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Guardian management (root authority or the account)
  // ───────────────────────────────────────────────────────────────────────

  addGuardian(caller: Address, account: Address, guardian: Address): GuardianConfig {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    this.requireOwner(caller, target);
    const added = normalizeAddress(guardian);

    if (isZeroAddress(added) || state.config.guardians.includes(added)) {
      throw new RecoveryError("INVALID_CONFIG", `Cannot add guardian ${added} to ${target}`, {
        account: target,
        guardian: added,
      });
    }
    return this.updateConfig(target, state, { ...state.config, guardians: [...state.config.guardians, added] });
  }

  /**
   * Removing a guardian also withdraws their approval from any
   * outstanding request.
   */
  removeGuardian(caller: Address, account: Address, guardian: Address): GuardianConfig {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    this.requireOwner(caller, target);
    const removed = normalizeAddress(guardian);

    if (!state.config.guardians.includes(removed)) {
      throw new RecoveryError("INVALID_CONFIG", `${removed} is not a guardian of ${target}`, {
        account: target,
        guardian: removed,
      });
    }
    const guardians = state.config.guardians.filter((g) => g !== removed);
    const config = this.updateConfig(target, state, { ...state.config, guardians });

    if (state.request !== undefined && state.request.approvals.includes(removed)) {
      state.request = withApprovals(
        state.request,
        state.request.approvals.filter((g) => g !== removed),
      );
    }
    return config;
  }

  updateThreshold(caller: Address, account: Address, threshold: number): GuardianConfig {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    this.requireOwner(caller, target);
    return this.updateConfig(target, state, { ...state.config, threshold });
  }

  setRecoveryDelay(caller: Address, account: Address, recoveryDelay: number): GuardianConfig {
    const target = normalizeAddress(account);
    const state = this.requireState(target);
    this.requireOwner(caller, target);
    if (!Number.isSafeInteger(recoveryDelay) || recoveryDelay <= 0) {
      throw new RecoveryError("INVALID_CONFIG", `Recovery delay must be a positive number of seconds, got ${recoveryDelay}`);
    }
    return this.updateConfig(target, state, { ...state.config, recoveryDelay });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getConfig(account: Address): GuardianConfig | null {
    return this.accounts.get(normalizeAddress(account))?.config ?? null;
  }

  getRecoveryRequest(account: Address): RecoveryRequest | null {
    return this.accounts.get(normalizeAddress(account))?.request ?? null;
  }

  isGuardian(account: Address, identity: Address): boolean {
    return this.accounts.get(normalizeAddress(account))?.config.guardians.includes(normalizeAddress(identity)) ?? false;
  }

  /** Earliest execution time of the outstanding request, if any. */
  recoveryUnlockTime(account: Address): Timestamp | null {
    const state = this.accounts.get(normalizeAddress(account));
    if (state?.request === undefined) {
      return null;
    }
    return state.request.initiatedAt + state.config.recoveryDelay;
  }

  getEventHistory(): readonly RecoveryEvent[] {
    return [...this.events];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Revertible
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const accounts = structuredClone(this.accounts);
    const eventCount = this.events.length;
    return () => {
      this.accounts = accounts;
      this.events.length = eventCount;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private requireState(account: Address): AccountRecoveryState {
    const state = this.accounts.get(account);
    if (state === undefined) {
      throw new RecoveryError("MODULE_STATE_ERROR", `${this.name} not installed for ${account}`);
    }
    return state;
  }

  private requireRequest(state: AccountRecoveryState, account: Address): RecoveryRequest {
    if (state.request === undefined) {
      throw new RecoveryError("NO_RECOVERY_REQUEST", `No recovery request for ${account}`, { account });
    }
    return state.request;
  }

  private requireGuardian(state: AccountRecoveryState, caller: Address, account: Address): Address {
    const guardian = normalizeAddress(caller);
    if (!state.config.guardians.includes(guardian)) {
      this.logger.debug({ account, caller: guardian }, "Rejected: not a guardian");
      throw new RecoveryError("UNAUTHORIZED", `${guardian} is not a guardian of ${account}`, {
        account,
        caller: guardian,
      });
    }
    return guardian;
  }

  private requireOwner(caller: Address, account: Address): Address {
    const by = normalizeAddress(caller);
    if (by !== account && by !== this.controller.getRootAuthority(account)) {
      throw new RecoveryError("UNAUTHORIZED", `${by} does not control ${account}`, { account, caller: by });
    }
    return by;
  }

  private updateConfig(account: Address, state: AccountRecoveryState, config: GuardianConfig): GuardianConfig {
    if (
      !Number.isSafeInteger(config.threshold) ||
      config.threshold < MIN_THRESHOLD ||
      config.threshold > config.guardians.length
    ) {
      throw new RecoveryError(
        "INVALID_CONFIG",
        `Threshold ${config.threshold} invalid for ${config.guardians.length} guardians (minimum ${MIN_THRESHOLD})`,
        { account, threshold: config.threshold, guardians: config.guardians.length },
      );
    }
    state.config = config;
    this.emitConfig(account, config);
    this.logger.info(
      { account, guardians: config.guardians.length, threshold: config.threshold, recoveryDelay: config.recoveryDelay },
      "Guardian config updated",
    );
    return config;
  }

  private emitConfig(account: Address, config: GuardianConfig): void {
    this.emit({
      type: "guardians_changed",
      account,
      guardians: config.guardians,
      threshold: config.threshold,
      recoveryDelay: config.recoveryDelay,
      timestamp: this.clock.now(),
    });
  }

  private emit(event: RecoveryEvent): void {
    this.events.push(event);
  }
}

function withApprovals(request: RecoveryRequest, approvals: readonly Address[]): RecoveryRequest {
  return { ...request, approvals, approvalCount: approvals.length };
}
