/**
 * Account Core — the single entry point for state-mutating account operations.
 *
 * Flow per operation:
 *   authorize (ValidationManager) → hooks preCheck (install order)
 *   → effect (CallDispatcher) → hooks postCheck (reverse order)
 *   → record activity
 *
 * Rules:
 * - Every mutating operation is atomic: a thrown error restores the
 *   account, the validation table and every installed module to their
 *   state before the call, then propagates unchanged
 * - Nested operations on other accounts share the outermost operation's
 *   fate
 * - A dispatcher reporting failure is a result, not a revert; spend
 *   recorded by hooks stays recorded
 * - Re-entering an account while one of its operations runs fails
 * - lastActivityTime moves on every successful mutating call
 */

import {
  DAY,
  ROOT_VALIDATION_ID,
  SystemClock,
  canonicalAddress,
  componentLogger,
  isBastionError,
  isHookModule,
  isRevertible,
  isValidationId,
  isValidatorModule,
  isZeroAddress,
  normalizeAddress,
  normalizeSelector,
} from "@bastion/types";
import type {
  AccountController,
  Address,
  Call,
  CallDispatcher,
  Clock,
  ExecutionHost,
  ExecutionResult,
  Hex,
  Hex32,
  HookModule,
  HookToken,
  InstalledModule,
  Logger,
  Module,
  ModuleKind,
  Operation,
  Revertible,
  Rollback,
  Timestamp,
  ValidationId,
} from "@bastion/types";
import { ValidationManager } from "./validation-manager.js";
import { AccountError } from "./types.js";
import type { Account, AccountCoreOptions, AccountEvent, AccountState, CreateAccountParams } from "./types.js";

export const DEFAULT_EMERGENCY_DELAY = 30 * DAY;

/** Rollbacks of everything an outermost operation has touched so far. */
interface Transaction {
  readonly enlisted: Set<object>;
  readonly rollbacks: Rollback[];
}

export class AccountCore implements AccountController, ExecutionHost {
  public readonly validation: ValidationManager;
  public readonly emergencyDelay: number;
  public readonly entryPoint: Address | undefined;

  private readonly accounts = new Map<Address, AccountState>();
  private readonly locked = new Set<Address>();
  private transaction: Transaction | undefined = undefined;
  private readonly clock: Clock;
  private readonly dispatcher: CallDispatcher;
  private readonly logger: Logger;

  constructor(options: AccountCoreOptions) {
    this.clock = options.clock ?? new SystemClock();
    this.dispatcher = options.dispatcher;
    this.entryPoint = options.entryPoint !== undefined ? normalizeAddress(options.entryPoint) : undefined;
    this.emergencyDelay = options.emergencyDelay ?? DEFAULT_EMERGENCY_DELAY;
    this.logger = componentLogger("AccountCore", options.logger);
    this.validation = new ValidationManager({ verifier: options.verifier, logger: options.logger });

    if (!Number.isSafeInteger(this.emergencyDelay) || this.emergencyDelay <= 0) {
      throw new AccountError("INVALID_CONFIG", `Emergency delay must be a positive number of seconds, got ${this.emergencyDelay}`);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * The address an account created with these parameters would get.
   */
  computeAddress(params: CreateAccountParams): Address {
    return canonicalAddress({
      rootAuthority: normalizeAddress(params.rootAuthority),
      emergencyRecoveryIdentity: normalizeAddress(params.emergencyRecoveryIdentity),
      salt: params.salt ?? "",
    });
  }

  /**
   * @throws {AccountError} INVALID_VALIDATOR, INVALID_CONFIG, ACCOUNT_EXISTS
   */
  createAccount(params: CreateAccountParams): Account {
    const rootAuthority = normalizeAddress(params.rootAuthority);
    const emergencyRecoveryIdentity = normalizeAddress(params.emergencyRecoveryIdentity);
    if (isZeroAddress(rootAuthority)) {
      throw new AccountError("INVALID_VALIDATOR", "Root authority cannot be the zero address");
    }
    if (isZeroAddress(emergencyRecoveryIdentity)) {
      throw new AccountError("INVALID_CONFIG", "Emergency recovery identity cannot be the zero address");
    }

    const address = this.computeAddress(params);
    if (this.accounts.has(address)) {
      throw new AccountError("ACCOUNT_EXISTS", `Account ${address} already exists`, { account: address });
    }

    const now = this.clock.now();
    const account: Account = {
      address,
      rootAuthority,
      emergencyRecoveryIdentity,
      lastActivityTime: now,
      createdAt: now,
      salt: params.salt ?? "",
    };
    const state: AccountState = { account, modules: [], events: [] };
    this.accounts.set(address, state);

    this.emit(state, { type: "account_created", account: address, rootAuthority, emergencyRecoveryIdentity, timestamp: now });
    this.logger.info({ account: address, rootAuthority }, "Account created");
    return account;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Execution
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Authorize and run one operation.
   *
   * @throws {BastionError} whatever the validator, a hook or the
   *   dispatcher threw; all state is reverted first
   */
  execute(caller: Address, account: Address, operation: Operation): ExecutionResult {
    const from = normalizeAddress(caller);
    return this.atomically(normalizeAddress(account), [], (state) => this.executeOne(state, from, operation));
  }

  /**
   * Run operations in order; one failure reverts them all.
   */
  executeBatch(caller: Address, account: Address, operations: readonly Operation[]): readonly ExecutionResult[] {
    const from = normalizeAddress(caller);
    return this.atomically(normalizeAddress(account), [], (state) =>
      operations.map((operation) => this.executeOne(state, from, operation)),
    );
  }

  /**
   * Run a call on behalf of an installed executor module.
   * Hooks gate it exactly as they gate execute().
   */
  executeFromExecutor(caller: Address, account: Address, call: Call): ExecutionResult {
    const from = normalizeAddress(caller);
    return this.atomically(normalizeAddress(account), [], (state) => {
      const installed = state.modules.some((m) => m.kind === "executor" && m.module.address === from);
      if (!installed) {
        this.logger.debug({ account: state.account.address, caller: from }, "Rejected: not an installed executor");
        throw new AccountError(
          "UNAUTHORIZED",
          `${from} is not an executor installed on ${state.account.address}`,
          { account: state.account.address, caller: from },
        );
      }
      return this.run(state, from, normalizeCall(call), null);
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Modules
  // ───────────────────────────────────────────────────────────────────────

  /**
   * @throws {AccountError} UNAUTHORIZED, MODULE_STATE_ERROR; or whatever
   *   the module's onInstall threw
   */
  installModule(caller: Address, account: Address, kind: ModuleKind, module: Module, initData?: unknown): void {
    const from = normalizeAddress(caller);
    this.atomically(normalizeAddress(account), [module], (state) => {
      const address = state.account.address;
      this.requireOwner(state, from);
      const entry = asInstalled(kind, module);
      if (findModule(state, kind, module.address) !== -1) {
        throw new AccountError(
          "MODULE_STATE_ERROR",
          `${kind} ${module.address} already installed on ${address}`,
          { account: address, kind, module: module.address },
        );
      }

      module.onInstall(address, initData);
      if (entry.kind === "validator") {
        this.validation.register(address, entry.module);
      }
      state.modules.push(entry);

      const now = this.touch(state);
      this.emit(state, { type: "module_installed", account: address, kind, module: module.address, timestamp: now });
      this.logger.info({ account: address, kind, module: module.name }, "Module installed");
    });
  }

  /**
   * @throws {AccountError} UNAUTHORIZED, MODULE_STATE_ERROR; or whatever
   *   the module's onUninstall threw
   */
  uninstallModule(caller: Address, account: Address, kind: ModuleKind, module: Module, deinitData?: unknown): void {
    const from = normalizeAddress(caller);
    this.atomically(normalizeAddress(account), [], (state) => {
      const address = state.account.address;
      this.requireOwner(state, from);
      const index = findModule(state, kind, module.address);
      const entry = state.modules[index];
      if (entry === undefined) {
        throw new AccountError(
          "MODULE_STATE_ERROR",
          `${kind} ${module.address} not installed on ${address}`,
          { account: address, kind, module: module.address },
        );
      }

      entry.module.onUninstall(address, deinitData);
      if (entry.kind === "validator") {
        this.validation.unregister(address, entry.module);
      }
      state.modules.splice(index, 1);

      const now = this.touch(state);
      this.emit(state, { type: "module_uninstalled", account: address, kind, module: module.address, timestamp: now });
      this.logger.info({ account: address, kind, module: entry.module.name }, "Module uninstalled");
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Root authority
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace the root authority. Callable by the current root authority,
   * the account itself, or a validator module installed on it.
   *
   * @throws {AccountError} UNAUTHORIZED, INVALID_VALIDATOR
   */
  setRootAuthority(caller: Address, account: Address, newRootAuthority: Address): void {
    const from = normalizeAddress(caller);
    const next = normalizeAddress(newRootAuthority);
    this.atomically(normalizeAddress(account), [], (state) => {
      const { address, rootAuthority } = state.account;
      const isValidator = state.modules.some((m) => m.kind === "validator" && m.module.address === from);
      if (from !== rootAuthority && from !== address && !isValidator) {
        this.logger.debug({ account: address, caller: from }, "Rejected: may not set root authority");
        throw new AccountError("UNAUTHORIZED", `${from} may not set the root authority of ${address}`, {
          account: address,
          caller: from,
        });
      }
      if (isZeroAddress(next)) {
        throw new AccountError("INVALID_VALIDATOR", "Root authority cannot be the zero address");
      }

      state.account = { ...state.account, rootAuthority: next };
      const now = this.touch(state);
      this.emit(state, {
        type: "root_authority_changed",
        account: address,
        previous: rootAuthority,
        next,
        changedBy: from,
        timestamp: now,
      });
      this.logger.info({ account: address, previous: rootAuthority, next, changedBy: from }, "Root authority changed");
    });
  }

  /**
   * Last-resort takeover by the emergency identity after a full
   * emergency delay without activity. Restarts the inactivity window.
   *
   * @throws {AccountError} UNAUTHORIZED, RECOVERY_DELAY_NOT_PASSED, INVALID_VALIDATOR
   */
  emergencyRecovery(caller: Address, account: Address, newRootAuthority: Address): void {
    const from = normalizeAddress(caller);
    const next = normalizeAddress(newRootAuthority);
    this.atomically(normalizeAddress(account), [], (state) => {
      const { address, rootAuthority, emergencyRecoveryIdentity, lastActivityTime } = state.account;
      if (from !== emergencyRecoveryIdentity) {
        throw new AccountError("UNAUTHORIZED", `${from} is not the emergency identity of ${address}`, {
          account: address,
          caller: from,
        });
      }
      const now = this.clock.now();
      if (now <= lastActivityTime + this.emergencyDelay) {
        throw new AccountError(
          "RECOVERY_DELAY_NOT_PASSED",
          `Emergency recovery for ${address} unlocks after ${lastActivityTime + this.emergencyDelay}, now ${now}`,
          { account: address, unlockAt: lastActivityTime + this.emergencyDelay + 1, now },
        );
      }
      if (isZeroAddress(next)) {
        throw new AccountError("INVALID_VALIDATOR", "Root authority cannot be the zero address");
      }

      state.account = { ...state.account, rootAuthority: next };
      this.touch(state);
      this.emit(state, {
        type: "emergency_recovery",
        account: address,
        previous: rootAuthority,
        next,
        changedBy: from,
        timestamp: now,
      });
      this.logger.warn({ account: address, previous: rootAuthority, next }, "Emergency recovery executed");
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Signatures
  // ───────────────────────────────────────────────────────────────────────

  isValidSignature(
    account: Address,
    hash: Hex32,
    signature: Hex,
    validationId: ValidationId = ROOT_VALIDATION_ID,
  ): boolean {
    const state = this.requireAccount(normalizeAddress(account));
    const { address, rootAuthority } = state.account;
    const modules = state.modules.map((m) => m.module);
    return this.validation.isValidSignature(address, rootAuthority, hash, signature, validationId, modules);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  getAccount(account: Address): Account | null {
    return this.accounts.get(normalizeAddress(account))?.account ?? null;
  }

  /**
   * @throws {AccountError} ACCOUNT_NOT_FOUND
   */
  getRootAuthority(account: Address): Address {
    return this.requireAccount(normalizeAddress(account)).account.rootAuthority;
  }

  isModuleInstalled(account: Address, kind: ModuleKind, module: Address): boolean {
    const state = this.accounts.get(normalizeAddress(account));
    return state !== undefined && findModule(state, kind, normalizeAddress(module)) !== -1;
  }

  /** Module addresses of one kind, in install order. */
  getInstalledModules(account: Address, kind: ModuleKind): readonly Address[] {
    const state = this.requireAccount(normalizeAddress(account));
    return state.modules.filter((m) => m.kind === kind).map((m) => m.module.address);
  }

  /** Earliest time emergencyRecovery can succeed. */
  emergencyUnlockTime(account: Address): Timestamp {
    return this.requireAccount(normalizeAddress(account)).account.lastActivityTime + this.emergencyDelay + 1;
  }

  getEventHistory(account: Address): readonly AccountEvent[] {
    return [...(this.accounts.get(normalizeAddress(account))?.events ?? [])];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Run `fn` under the account's lock, reverting every participant on error.
   * `extra` names modules taking part that are not yet installed.
   *
   * The outermost call opens a transaction; nested calls into other
   * accounts enlist their account and modules in it, so a failure of
   * the outer call reverts them too. A nested call that fails reverts
   * only its own savepoint.
   */
  private atomically<T>(account: Address, extra: readonly Module[], fn: (state: AccountState) => T): T {
    const state = this.requireAccount(account);
    if (this.locked.has(account)) {
      this.logger.debug({ account }, "Rejected: reentrant call");
      throw new AccountError("REENTRANT_CALL", `Account ${account} is already executing`, { account });
    }

    this.locked.add(account);
    const enclosing = this.transaction;
    const transaction = enclosing ?? this.begin();
    const savepoint = enclosing !== undefined ? this.checkpoints(state, extra) : undefined;
    this.enlist(transaction, state, extra);
    this.transaction = transaction;
    try {
      return fn(state);
    } catch (error) {
      for (const rollback of [...(savepoint ?? transaction.rollbacks)].reverse()) {
        rollback();
      }
      this.logger.debug(
        { account, nested: enclosing !== undefined, code: isBastionError(error) ? error.code : undefined },
        "Operation reverted",
      );
      throw error;
    } finally {
      this.transaction = enclosing;
      this.locked.delete(account);
    }
  }

  /** Opens a transaction that also forgets accounts created inside it. */
  private begin(): Transaction {
    const known = new Set(this.accounts.keys());
    const forgetCreated: Rollback = () => {
      for (const address of [...this.accounts.keys()]) {
        if (!known.has(address)) {
          this.accounts.delete(address);
        }
      }
    };
    return { enlisted: new Set(), rollbacks: [forgetCreated] };
  }

  private enlist(transaction: Transaction, state: AccountState, extra: readonly Module[]): void {
    if (!transaction.enlisted.has(state)) {
      transaction.enlisted.add(state);
      transaction.rollbacks.push(this.snapshot(state));
    }
    for (const participant of this.participants(state, extra)) {
      if (!transaction.enlisted.has(participant)) {
        transaction.enlisted.add(participant);
        transaction.rollbacks.push(participant.checkpoint());
      }
    }
  }

  private checkpoints(state: AccountState, extra: readonly Module[]): Rollback[] {
    return [this.snapshot(state), ...this.participants(state, extra).map((p) => p.checkpoint())];
  }

  private snapshot(state: AccountState): Rollback {
    const { account, events } = state;
    const modules = [...state.modules];
    const eventCount = events.length;
    return () => {
      state.account = account;
      state.modules = modules;
      events.length = eventCount;
    };
  }

  private participants(state: AccountState, extra: readonly Module[]): Revertible[] {
    const revertible = new Set<Revertible>([this.validation]);
    for (const module of [...state.modules.map((m) => m.module), ...extra]) {
      if (isRevertible(module)) {
        revertible.add(module);
      }
    }
    return [...revertible];
  }

  private executeOne(state: AccountState, caller: Address, operation: Operation): ExecutionResult {
    const { address, rootAuthority } = state.account;
    const validationId = operation.validationId;
    if (!isValidationId(validationId)) {
      throw new AccountError("INVALID_VALIDATOR", `Malformed validation id ${validationId}`);
    }
    const call = normalizeCall(operation.call);

    this.validation.validate({
      account: address,
      rootAuthority,
      caller,
      call,
      validationId,
      delegationId: operation.delegationId,
      signature: operation.signature,
      entryPoint: this.entryPoint,
    });
    return this.run(state, caller, call, validationId);
  }

  private run(state: AccountState, caller: Address, call: Call, validationId: ValidationId | null): ExecutionResult {
    const address = state.account.address;
    const hooks = state.modules.flatMap((m) => (m.kind === "hook" ? [m.module] : []));

    const tokens: [HookModule, HookToken][] = [];
    for (const hook of hooks) {
      tokens.push([hook, hook.preCheck(address, caller, call.value, call)]);
    }

    const result = this.dispatcher.dispatch(address, call);

    for (const [hook, token] of tokens.reverse()) {
      hook.postCheck(address, token);
    }

    const now = this.touch(state);
    this.emit(state, {
      type: "executed",
      account: address,
      caller,
      target: call.target,
      selector: call.data.selector,
      value: call.value,
      success: result.success,
      validationId,
      timestamp: now,
    });
    this.logger.info(
      { account: address, caller, target: call.target, selector: call.data.selector, success: result.success },
      "Executed",
    );
    return result;
  }

  private requireAccount(account: Address): AccountState {
    const state = this.accounts.get(account);
    if (state === undefined) {
      throw new AccountError("ACCOUNT_NOT_FOUND", `Account ${account} not found`, { account });
    }
    return state;
  }

  private requireOwner(state: AccountState, caller: Address): void {
    const { address, rootAuthority } = state.account;
    if (caller !== rootAuthority && caller !== address && caller !== this.entryPoint) {
      this.logger.debug({ account: address, caller }, "Rejected: caller does not control account");
      throw new AccountError("UNAUTHORIZED", `${caller} does not control ${address}`, { account: address, caller });
    }
  }

  private touch(state: AccountState): Timestamp {
    const now = this.clock.now();
    state.account = { ...state.account, lastActivityTime: now };
    return now;
  }

  private emit(state: AccountState, event: AccountEvent): void {
    state.events.push(event);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function normalizeCall(call: Call): Call {
  if (call.value < 0n) {
    throw new AccountError("INVALID_CONFIG", `Call value must be non-negative, got ${call.value}`);
  }
  return {
    target: normalizeAddress(call.target),
    value: call.value,
    data: { selector: normalizeSelector(call.data.selector), args: call.data.args },
  };
}

function findModule(state: AccountState, kind: ModuleKind, address: Address): number {
  return state.modules.findIndex((m) => m.kind === kind && m.module.address === address);
}

/**
 * Tag a module with the capability it is installed for, checking that
 * it actually has it.
 */
function asInstalled(kind: ModuleKind, module: Module): InstalledModule {
  if (!module.isModuleType(kind)) {
    throw new AccountError("MODULE_STATE_ERROR", `${module.name} is not a ${kind} module`, {
      kind,
      module: module.address,
    });
  }
  switch (kind) {
    case "validator":
      if (isValidatorModule(module)) {
        return { kind, module };
      }
      break;
    case "hook":
      if (isHookModule(module)) {
        return { kind, module };
      }
      break;
    case "executor":
      return { kind, module };
  }
  throw new AccountError("MODULE_STATE_ERROR", `${module.name} lacks the ${kind} interface`, {
    kind,
    module: module.address,
  });
}
