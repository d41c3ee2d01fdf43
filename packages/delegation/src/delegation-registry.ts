/**
 * Delegation Registry — time-bound, capability-scoped authority grants.
 *
 * Any identity may delegate to another. The registry is also a module:
 * installed as a validator it authorizes delegated operations on an
 * account, installed as an executor it runs calls on a delegatee's
 * behalf through the account's ExecutionHost.
 *
 * Rules:
 * - Identifiers are content-addressed and never reused
 * - Status transitions only active → revoked | expired
 * - Expiry is evaluated lazily; a use after expiry persists the
 *   expired status before failing
 * - spentAmount never exceeds a non-zero spendingLimit
 * - Queries never mutate
 */

import {
  DAY,
  HOUR,
  SystemClock,
  canonicalDigest,
  componentLogger,
  isZeroAddress,
  normalizeAddress,
  normalizeHex32,
  normalizeSelector,
} from "@bastion/types";
import type {
  Address,
  Call,
  CanonicalValue,
  Clock,
  DelegationLookup,
  ExecutionHost,
  ExecutionResult,
  Hex,
  Hex32,
  Logger,
  ModuleKind,
  Revertible,
  Rollback,
  Selector,
  SignatureVerifier,
  Timestamp,
  ValidationContext,
  ValidatorModule,
} from "@bastion/types";
import { DelegationError } from "./types.js";
import type {
  CreateDelegationParams,
  Delegation,
  DelegationEvent,
  DelegationKind,
  DelegationRegistryOptions,
  DelegationStatus,
} from "./types.js";

export const DEFAULT_MIN_DURATION = HOUR;
export const DEFAULT_MAX_DURATION = 365 * DAY;

/** Kinds that may drive execution on the delegator's account. */
const EXECUTION_KINDS: readonly DelegationKind[] = ["full", "executor"];

/** Kinds that may sign on the delegator's behalf through this module. */
const SIGNING_KINDS: readonly DelegationKind[] = ["full", "validator"];

interface RegistryState {
  delegations: Map<Hex32, Delegation>;
  byDelegator: Map<Address, Hex32[]>;
  byDelegatee: Map<Address, Hex32[]>;
  nonces: Map<Address, number>;
  admins: Set<Address>;
  installs: Map<Address, number>;
  sequence: number;
}

export class DelegationRegistry implements ValidatorModule, DelegationLookup, Revertible {
  public readonly address: Address;
  public readonly name = "DelegationRegistry";
  public readonly minDuration: number;
  public readonly maxDuration: number;

  private state: RegistryState;
  private readonly events: DelegationEvent[] = [];
  private readonly clock: Clock;
  private readonly host: ExecutionHost | undefined;
  private readonly verifier: SignatureVerifier | undefined;
  private readonly logger: Logger;

  constructor(options: DelegationRegistryOptions) {
    this.address = normalizeAddress(options.address);
    this.clock = options.clock ?? new SystemClock();
    this.host = options.host;
    this.verifier = options.verifier;
    this.logger = componentLogger(this.name, options.logger);

    this.minDuration = options.minDuration ?? DEFAULT_MIN_DURATION;
    this.maxDuration = options.maxDuration ?? DEFAULT_MAX_DURATION;
    if (
      !Number.isSafeInteger(this.minDuration) ||
      !Number.isSafeInteger(this.maxDuration) ||
      this.minDuration <= 0 ||
      this.maxDuration < this.minDuration
    ) {
      throw new DelegationError(
        "INVALID_CONFIG",
        `Invalid duration bounds: min ${this.minDuration}, max ${this.maxDuration}`,
      );
    }

    this.state = {
      delegations: new Map(),
      byDelegator: new Map(),
      byDelegatee: new Map(),
      nonces: new Map(),
      admins: new Set((options.admins ?? []).map(normalizeAddress)),
      installs: new Map(),
      sequence: 0,
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Creation
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create a delegation from `caller` to `params.delegatee`, starting now.
   *
   * @throws {DelegationError} INVALID_DELEGATEE, INVALID_DURATION, INVALID_CONFIG, DELEGATION_ALREADY_EXISTS
   */
  createDelegation(caller: Address, params: CreateDelegationParams): Delegation {
    return this.create(normalizeAddress(caller), params);
  }

  /**
   * Create a delegation on behalf of `delegator`, authorized by their
   * signature over {@link delegationDigest}. Anyone may relay it.
   */
  createDelegationWithSignature(
    caller: Address,
    delegator: Address,
    params: CreateDelegationParams,
    signature: Hex,
  ): Delegation {
    const from = normalizeAddress(delegator);
    if (this.verifier === undefined) {
      throw new DelegationError("INVALID_SIGNATURE", "No signature verifier configured");
    }

    const digest = this.delegationDigest(from, params);
    const signer = this.verifier.recover(digest, signature);
    if (signer === undefined || normalizeAddress(signer) !== from) {
      this.logger.debug({ delegator: from, relayer: caller }, "Rejected: signature mismatch");
      throw new DelegationError(
        "INVALID_SIGNATURE",
        `Signature does not recover to delegator ${from}`,
        { delegator: from, signer: signer ?? null },
      );
    }

    const delegation = this.create(from, params);
    this.state.nonces.set(from, this.getNonce(from) + 1);
    this.logger.info({ id: delegation.id, delegator: from, relayer: caller }, "Delegation created by signature");
    return delegation;
  }

  /**
   * The digest a delegator signs to authorize a delegation, bound to
   * this registry and the delegator's current nonce.
   */
  delegationDigest(delegator: Address, params: CreateDelegationParams): Hex32 {
    const from = normalizeAddress(delegator);
    const payload: CanonicalValue = {
      action: "createDelegation",
      registry: this.address,
      delegator: from,
      delegatee: normalizeAddress(params.delegatee),
      kind: params.kind,
      duration: params.duration,
      spendingLimit: (params.spendingLimit ?? 0n).toString(),
      allowedSelectors: (params.allowedSelectors ?? []).map(normalizeSelector),
      nonce: this.getNonce(from),
    };
    return canonicalDigest(payload);
  }

  getNonce(delegator: Address): number {
    return this.state.nonces.get(normalizeAddress(delegator)) ?? 0;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Lifecycle
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Revoke an active delegation. Only its delegator or an admin may.
   *
   * @throws {DelegationError} DELEGATION_NOT_FOUND, UNAUTHORIZED, DELEGATION_NOT_ACTIVE
   */
  revokeDelegation(caller: Address, id: Hex32): Delegation {
    const by = normalizeAddress(caller);
    const delegation = this.requireDelegation(id);

    if (delegation.delegator !== by && !this.state.admins.has(by)) {
      throw new DelegationError(
        "UNAUTHORIZED",
        `${by} may not revoke delegation ${id}`,
        { id, caller: by },
      );
    }
    const current = this.settleExpiry(delegation);
    if (current.status !== "active") {
      throw new DelegationError(
        "DELEGATION_NOT_ACTIVE",
        `Delegation ${id} is ${current.status}`,
        { id, status: current.status },
      );
    }

    const revoked = this.store({ ...current, status: "revoked" });
    this.emit({ type: "delegation_revoked", id: revoked.id, revokedBy: by, timestamp: this.clock.now() });
    this.logger.info({ id: revoked.id, revokedBy: by }, "Delegation revoked");
    return revoked;
  }

  /**
   * Consume `amount` of a delegation's allowance on behalf of its delegatee.
   *
   * Check order: existence, caller, status, expiry, allowance.
   * An expired delegation is marked expired before the error surfaces.
   *
   * @throws {DelegationError} DELEGATION_NOT_FOUND, UNAUTHORIZED, DELEGATION_NOT_ACTIVE,
   *   DELEGATION_EXPIRED, SPENDING_LIMIT_EXCEEDED
   */
  useDelegation(caller: Address, id: Hex32, amount: bigint): Delegation {
    if (amount < 0n) {
      throw new DelegationError("INVALID_CONFIG", `Amount must be non-negative, got ${amount}`);
    }
    const delegation = this.requireUsable(normalizeAddress(caller), id);

    const spent = delegation.spentAmount + amount;
    if (delegation.spendingLimit > 0n && spent > delegation.spendingLimit) {
      const available = delegation.spendingLimit - delegation.spentAmount;
      this.logger.debug(
        { id, amount: amount.toString(), available: available.toString() },
        "Rejected: delegation allowance exceeded",
      );
      throw new DelegationError(
        "SPENDING_LIMIT_EXCEEDED",
        `Delegation ${id} allowance exceeded: requested ${amount}, available ${available}`,
        { id, amount, limit: delegation.spendingLimit, available },
      );
    }

    const used = this.store({ ...delegation, spentAmount: spent });
    this.emit({ type: "delegation_used", id: used.id, amount, spentAmount: spent, timestamp: this.clock.now() });
    return used;
  }

  addAdmin(caller: Address, admin: Address): void {
    this.setAdmin(caller, admin, true);
  }

  removeAdmin(caller: Address, admin: Address): void {
    this.setAdmin(caller, admin, false);
  }

  isAdmin(identity: Address): boolean {
    return this.state.admins.has(normalizeAddress(identity));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Whether the delegation authorizes calling `selector` right now.
   */
  isValidForSelector(id: Hex32, selector: Selector): boolean {
    const delegation = this.lookup(id);
    if (delegation === undefined || this.statusAt(delegation) !== "active") {
      return false;
    }
    switch (delegation.kind) {
      case "full":
      case "executor":
        return true;
      case "limited":
        return delegation.allowedSelectors.includes(normalizeSelector(selector));
      case "validator":
        return false;
    }
  }

  /**
   * Whether `delegatee` holds an active delegation from `delegator`,
   * optionally restricted to the given kinds.
   */
  hasDelegation(delegator: Address, delegatee: Address, kinds?: readonly DelegationKind[]): boolean {
    const to = normalizeAddress(delegatee);
    return this.idsOf(this.state.byDelegator, normalizeAddress(delegator)).some((id) => {
      const delegation = this.state.delegations.get(id);
      return (
        delegation !== undefined &&
        delegation.delegatee === to &&
        this.statusAt(delegation) === "active" &&
        (kinds === undefined || kinds.includes(delegation.kind))
      );
    });
  }

  /**
   * The delegation with its status as of now. Unknown ids yield null.
   */
  getDelegation(id: Hex32): Delegation | null {
    const delegation = this.lookup(id);
    return delegation !== undefined ? this.view(delegation) : null;
  }

  /** Unknown ids are "inactive". */
  getStatus(id: Hex32): DelegationStatus {
    const delegation = this.lookup(id);
    return delegation !== undefined ? this.statusAt(delegation) : "inactive";
  }

  getDelegationsByDelegator(delegator: Address): readonly Delegation[] {
    return this.collect(this.state.byDelegator, normalizeAddress(delegator));
  }

  getDelegationsByDelegatee(delegatee: Address): readonly Delegation[] {
    return this.collect(this.state.byDelegatee, normalizeAddress(delegatee));
  }

  /**
   * Allowance left on a delegation; null when it is unlimited.
   */
  remainingAllowance(id: Hex32): bigint | null {
    const delegation = this.requireDelegation(id);
    if (delegation.spendingLimit === 0n) {
      return null;
    }
    return delegation.spendingLimit - delegation.spentAmount;
  }

  getEventHistory(): readonly DelegationEvent[] {
    return [...this.events];
  }

  // ───────────────────────────────────────────────────────────────────────
  // Module protocol
  // ───────────────────────────────────────────────────────────────────────

  isModuleType(kind: ModuleKind): boolean {
    return kind === "validator" || kind === "executor";
  }

  /** May be installed on one account as both validator and executor. */
  onInstall(account: Address, _initData: unknown): void {
    const count = this.state.installs.get(account) ?? 0;
    this.state.installs.set(account, count + 1);
    this.logger.info({ account }, "Delegation registry installed");
  }

  /**
   * Removing the last installation revokes every active delegation the
   * account has granted.
   */
  onUninstall(account: Address, _deinitData: unknown): void {
    const count = this.state.installs.get(account);
    if (count === undefined) {
      throw new DelegationError("MODULE_STATE_ERROR", `${this.name} not installed for ${account}`);
    }
    if (count > 1) {
      this.state.installs.set(account, count - 1);
      return;
    }
    this.state.installs.delete(account);

    const now = this.clock.now();
    let revoked = 0;
    for (const id of this.idsOf(this.state.byDelegator, account)) {
      const delegation = this.state.delegations.get(id);
      if (delegation !== undefined && this.statusAt(delegation) === "active") {
        this.store({ ...delegation, status: "revoked" });
        this.emit({ type: "delegation_revoked", id, revokedBy: account, timestamp: now });
        revoked++;
      }
    }
    this.logger.info({ account, revoked }, "Delegation registry uninstalled");
  }

  isInstalled(account: Address): boolean {
    return this.state.installs.has(account);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Validator protocol
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Authorize an operation submitted by a delegatee. Consumes the
   * call's value from the delegation's allowance.
   */
  validateOperation(account: Address, context: ValidationContext): boolean {
    if (context.delegationId === undefined) {
      this.logger.debug({ account, caller: context.caller }, "Rejected: no delegation named");
      return false;
    }
    const delegation = this.requireDelegation(context.delegationId);
    if (delegation.delegator !== account && delegation.delegator !== context.rootAuthority) {
      this.logger.debug({ account, id: delegation.id }, "Rejected: delegation not granted by account");
      return false;
    }

    this.requireUsable(context.caller, delegation.id);
    if (!this.isValidForSelector(delegation.id, context.call.data.selector)) {
      this.logger.debug(
        { account, id: delegation.id, selector: context.call.data.selector },
        "Rejected: selector not delegated",
      );
      return false;
    }

    this.useDelegation(context.caller, delegation.id, context.call.value);
    return true;
  }

  /**
   * Accepts a signature from a delegatee holding an active full or
   * validator delegation from the account.
   */
  isValidSignature(account: Address, hash: Hex32, signature: Hex): boolean {
    const signer = this.verifier?.recover(hash, signature);
    if (signer === undefined) {
      return false;
    }
    return this.hasDelegation(account, signer, SIGNING_KINDS);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Executor protocol
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Execute `call` on `account` for the delegatee `caller`.
   *
   * Allowance consumed here is restored if the host rejects the call.
   */
  executeAsDelegate(caller: Address, account: Address, id: Hex32, call: Call): ExecutionResult {
    const host = this.host;
    if (host === undefined) {
      throw new DelegationError("MODULE_STATE_ERROR", `${this.name} has no execution host`);
    }
    const target = normalizeAddress(account);
    const delegation = this.requireDelegation(id);

    if (!EXECUTION_KINDS.includes(delegation.kind)) {
      throw new DelegationError(
        "UNAUTHORIZED",
        `Delegation ${id} of kind ${delegation.kind} cannot execute`,
        { id, kind: delegation.kind },
      );
    }
    if (delegation.delegator !== target && delegation.delegator !== host.getRootAuthority(target)) {
      throw new DelegationError(
        "UNAUTHORIZED",
        `Delegation ${id} was not granted by ${target} or its root authority`,
        { id, account: target },
      );
    }

    const rollback = this.checkpoint();
    try {
      this.useDelegation(caller, id, call.value);
      const result = host.executeFromExecutor(this.address, target, call);
      this.logger.info({ account: target, id, success: result.success }, "Executed as delegate");
      return result;
    } catch (error) {
      rollback();
      throw error;
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Revertible
  // ───────────────────────────────────────────────────────────────────────

  checkpoint(): Rollback {
    const state = structuredClone(this.state);
    const eventCount = this.events.length;
    return () => {
      this.state = state;
      this.events.length = eventCount;
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Private
  // ───────────────────────────────────────────────────────────────────────

  private create(delegator: Address, params: CreateDelegationParams): Delegation {
    const delegatee = normalizeAddress(params.delegatee);
    if (isZeroAddress(delegatee) || delegatee === delegator) {
      throw new DelegationError(
        "INVALID_DELEGATEE",
        `Invalid delegatee ${delegatee} for delegator ${delegator}`,
        { delegator, delegatee },
      );
    }
    if (
      !Number.isSafeInteger(params.duration) ||
      params.duration < this.minDuration ||
      params.duration > this.maxDuration
    ) {
      throw new DelegationError(
        "INVALID_DURATION",
        `Duration ${params.duration}s outside [${this.minDuration}, ${this.maxDuration}]`,
        { duration: params.duration, min: this.minDuration, max: this.maxDuration },
      );
    }

    const spendingLimit = params.spendingLimit ?? 0n;
    if (spendingLimit < 0n) {
      throw new DelegationError("INVALID_CONFIG", `Spending limit must be non-negative, got ${spendingLimit}`);
    }
    const allowedSelectors = (params.allowedSelectors ?? []).map(normalizeSelector);
    if (params.kind === "limited" && allowedSelectors.length === 0) {
      throw new DelegationError("INVALID_CONFIG", "Limited delegation requires at least one selector");
    }
    if (params.kind !== "limited" && allowedSelectors.length > 0) {
      throw new DelegationError(
        "INVALID_CONFIG",
        `Selectors only apply to limited delegations, not ${params.kind}`,
      );
    }

    const now = this.clock.now();
    const sequence = this.state.sequence;
    const id = canonicalDigest({ delegator, delegatee, createdAt: now, sequence });
    if (this.state.delegations.has(id)) {
      throw new DelegationError("DELEGATION_ALREADY_EXISTS", `Delegation ${id} already exists`, { id });
    }

    const delegation: Delegation = {
      id,
      delegator,
      delegatee,
      kind: params.kind,
      status: "active",
      startTime: now,
      endTime: now + params.duration,
      spendingLimit,
      spentAmount: 0n,
      allowedSelectors: [...new Set(allowedSelectors)],
      sequence,
    };

    this.state.sequence = sequence + 1;
    this.store(delegation);
    this.index(this.state.byDelegator, delegator, id);
    this.index(this.state.byDelegatee, delegatee, id);

    this.emit({
      type: "delegation_created",
      id,
      delegator,
      delegatee,
      kind: delegation.kind,
      endTime: delegation.endTime,
      timestamp: now,
    });
    this.logger.info(
      { id, delegator, delegatee, kind: delegation.kind, endTime: delegation.endTime },
      "Delegation created",
    );
    return delegation;
  }

  /** Ids are matched case-insensitively. */
  private lookup(id: Hex32): Delegation | undefined {
    return this.state.delegations.get(normalizeHex32(id));
  }

  private requireDelegation(id: Hex32): Delegation {
    const delegation = this.lookup(id);
    if (delegation === undefined) {
      throw new DelegationError("DELEGATION_NOT_FOUND", `Delegation ${id} not found`, { id });
    }
    return delegation;
  }

  /**
   * Everything useDelegation checks short of the allowance.
   */
  private requireUsable(caller: Address, id: Hex32): Delegation {
    const delegation = this.requireDelegation(id);
    if (delegation.delegatee !== caller) {
      this.logger.debug({ id, caller }, "Rejected: caller is not the delegatee");
      throw new DelegationError(
        "UNAUTHORIZED",
        `${caller} is not the delegatee of ${id}`,
        { id, caller },
      );
    }
    if (delegation.status !== "active") {
      throw new DelegationError(
        "DELEGATION_NOT_ACTIVE",
        `Delegation ${id} is ${delegation.status}`,
        { id, status: delegation.status },
      );
    }
    if (this.settleExpiry(delegation).status === "expired") {
      this.logger.debug({ id, endTime: delegation.endTime }, "Rejected: delegation expired");
      throw new DelegationError(
        "DELEGATION_EXPIRED",
        `Delegation ${id} expired at ${delegation.endTime}`,
        { id, endTime: delegation.endTime },
      );
    }
    return delegation;
  }

  /**
   * Persist the active → expired transition once the end time has passed.
   */
  private settleExpiry(delegation: Delegation): Delegation {
    if (delegation.status !== "active" || this.statusAt(delegation) !== "expired") {
      return delegation;
    }
    const expired = this.store({ ...delegation, status: "expired" });
    this.emit({ type: "delegation_expired", id: delegation.id, timestamp: this.clock.now() });
    return expired;
  }

  private statusAt(delegation: Delegation, now: Timestamp = this.clock.now()): DelegationStatus {
    if (delegation.status === "active" && now > delegation.endTime) {
      return "expired";
    }
    return delegation.status;
  }

  private view(delegation: Delegation): Delegation {
    const status = this.statusAt(delegation);
    return status === delegation.status ? delegation : { ...delegation, status };
  }

  private store(delegation: Delegation): Delegation {
    this.state.delegations.set(delegation.id, delegation);
    return delegation;
  }

  private index(map: Map<Address, Hex32[]>, key: Address, id: Hex32): void {
    const ids = map.get(key);
    if (ids === undefined) {
      map.set(key, [id]);
    } else {
      ids.push(id);
    }
  }

  private idsOf(map: Map<Address, Hex32[]>, key: Address): readonly Hex32[] {
    return map.get(key) ?? [];
  }

  private collect(map: Map<Address, Hex32[]>, key: Address): readonly Delegation[] {
    const result: Delegation[] = [];
    for (const id of this.idsOf(map, key)) {
      const delegation = this.state.delegations.get(id);
      if (delegation !== undefined) {
        result.push(this.view(delegation));
      }
    }
    return result;
  }

  private setAdmin(caller: Address, admin: Address, granted: boolean): void {
    const by = normalizeAddress(caller);
    if (!this.state.admins.has(by)) {
      throw new DelegationError("UNAUTHORIZED", `${by} is not a registry admin`, { caller: by });
    }
    const target = normalizeAddress(admin);
    if (granted) {
      this.state.admins.add(target);
    } else {
      this.state.admins.delete(target);
    }
    this.emit({ type: "admin_changed", admin: target, granted, timestamp: this.clock.now() });
    this.logger.info({ admin: target, granted, by }, granted ? "Admin added" : "Admin removed");
  }

  private emit(event: DelegationEvent): void {
    this.events.push(event);
  }
}
