/**
 * Spending Limit Hook — rolling per-asset quota as a pre-execution gate.
 *
 * Bounds an account's aggregate outflow of each asset per period,
 * regardless of who triggered the call. Composes with per-delegation
 * limits: those bound one delegatee, this bounds the account.
 *
 * Rules:
 * - preCheck accounts the spend before the effect runs
 * - A rejected preCheck mutates nothing (not even the lazy reset)
 * - postCheck never rolls spend back: an attempted spend consumes quota
 *   even when the guarded effect later reports failure
 * - Administrative calls come from the account or its root authority
 */

import {
  AddressSchema,
  AmountSchema,
  SecondsSchema,
  SystemClock,
  componentLogger,
  parseWithSchema,
  normalizeAddress,
} from "@bastion/types";
import type {
  AccountController,
  Address,
  Call,
  Clock,
  HookModule,
  HookToken,
  Logger,
  ModuleKind,
  Rollback,
  Revertible,
} from "@bastion/types";
import { z } from "zod";
import { decodeSpends, effectiveConfig, periodElapsed, remaining } from "./decode.js";
import { SpendingLimitError } from "./types.js";
import type {
  AccountSpendingState,
  DecodedSpend,
  SpendingLimitConfig,
  SpendingLimitEvent,
  SpendingLimitHookOptions,
} from "./types.js";

// =============================================================================
// Init data
// =============================================================================

const LimitSchema = z.object({
  asset: AddressSchema,
  limit: AmountSchema,
  periodLength: SecondsSchema,
});

export const SpendingLimitInitSchema = z
  .object({
    limits: z.array(LimitSchema).default([]),
    whitelist: z.array(AddressSchema).default([]),
  })
  .default({});

export type SpendingLimitInitData = z.input<typeof SpendingLimitInitSchema>;

// =============================================================================
// Hook
// =============================================================================

export class SpendingLimitHook implements HookModule, Revertible {
  public readonly address: Address;
  public readonly name = "SpendingLimitHook";

  private accounts: Map<Address, AccountSpendingState> = new Map();
  private readonly events: SpendingLimitEvent[] = [];
  private readonly clock: Clock;
  private readonly controller: AccountController | undefined;
  private readonly logger: Logger;

  constructor(options: SpendingLimitHookOptions) {
    this.address = normalizeAddress(options.address);
    this.clock = options.clock ?? new SystemClock();
    this.controller = options.controller;
    this.logger = componentLogger(this.name, options.logger);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Module protocol
  // ───────────────────────────────────────────────────────────────────────

  isModuleType(kind: ModuleKind): boolean {
    return kind === "hook";
  }

  onInstall(account: Address, initData: unknown): void {
    const owner = normalizeAddress(account);
    if (this.accounts.has(owner)) {
      throw new SpendingLimitError(
        "MODULE_STATE_ERROR",
        `${this.name} already initialized for ${owner}`,
      );
    }
    const init = parseWithSchema(SpendingLimitInitSchema, initData, `${this.name} init data`);

    const state: AccountSpendingState = {
      limits: new Map(),
      whitelist: new Set(init.whitelist),
      paused: false,
    };
    const now = this.clock.now();
    for (const entry of init.limits) {
      assertLimit(entry.limit, entry.periodLength);
      state.limits.set(entry.asset, {
        asset: entry.asset,
        limit: entry.limit,
        periodLength: entry.periodLength,
        spent: 0n,
        periodStart: now,
        enabled: true,
      });
    }

    this.accounts.set(owner, state);
    this.logger.info(
      { account: owner, limits: init.limits.length, whitelist: init.whitelist.length },
      "Spending limits installed",
    );
  }

  onUninstall(account: Address, _deinitData: unknown): void {
    const owner = normalizeAddress(account);
    this.requireState(owner);
    this.accounts.delete(owner);
    this.logger.info({ account: owner }, "Spending limits uninstalled");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Hook protocol
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Gate a call before it runs, recording its outflow against the quota.
   * Whitelisted callers and targets pass without being decoded.
   *
   * @throws {SpendingLimitError} ACCOUNT_IS_PAUSED, SPENDING_LIMIT_EXCEEDED
   */
  preCheck(account: Address, caller: Address, value: bigint, call: Call): HookToken {
    const owner = normalizeAddress(account);
    const state = this.requireState(owner);

    if (state.whitelist.has(normalizeAddress(caller)) || state.whitelist.has(normalizeAddress(call.target))) {
      return this.token(owner, [], true);
    }
    if (state.paused) {
      this.logger.debug({ account: owner, caller }, "Rejected: account paused");
      throw new SpendingLimitError("ACCOUNT_IS_PAUSED", `Account ${owner} is paused`, {
        account: owner,
      });
    }

    const spends = decodeSpends(call, value);
    const now = this.clock.now();
    const updates: { config: SpendingLimitConfig; amount: bigint; reset: boolean }[] = [];

    for (const [asset, amount] of totalsByAsset(spends)) {
      const stored = state.limits.get(asset);
      if (stored === undefined || !stored.enabled) {
        continue;
      }
      const current = effectiveConfig(stored, now);
      if (current.spent + amount > current.limit) {
        const available = remaining(current);
        this.logger.debug(
          { account: owner, asset, amount: amount.toString(), available: available.toString() },
          "Rejected: spending limit exceeded",
        );
        throw new SpendingLimitError(
          "SPENDING_LIMIT_EXCEEDED",
          `Spending limit exceeded for asset ${asset}: requested ${amount}, available ${available} of ${current.limit}`,
          { asset, amount, limit: current.limit, available },
        );
      }
      updates.push({
        config: { ...current, spent: current.spent + amount },
        amount,
        reset: current !== stored,
      });
    }

    // All checks passed: commit.
    for (const { config, amount, reset } of updates) {
      if (reset) {
        this.emit({ type: "period_reset", account: owner, asset: config.asset, timestamp: now });
      }
      state.limits.set(config.asset, config);
      this.emit({
        type: "spend_recorded",
        account: owner,
        asset: config.asset,
        amount,
        spent: config.spent,
        timestamp: now,
      });
    }

    const accounted = updates.map(({ config, amount }) => ({ asset: config.asset, amount }));
    return this.token(owner, accounted, false);
  }

  postCheck(account: Address, token: HookToken): void {
    if (token.module !== this.address) {
      throw new SpendingLimitError(
        "MODULE_STATE_ERROR",
        `Hook token for ${token.module} handed to ${this.address}`,
      );
    }
    this.logger.debug({ account }, "postCheck");
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration (the account, or its root authority)
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Create or update the limit for an asset.
   *
   * Updating keeps the current period; spend already recorded above a
   * lowered limit is clamped to the new limit.
   */
  setSpendingLimit(
    caller: Address,
    account: Address,
    asset: Address,
    limit: bigint,
    periodLength: number,
  ): SpendingLimitConfig {
    const owner = normalizeAddress(account);
    const state = this.requireAdmin(caller, owner);
    const normalized = normalizeAddress(asset);
    assertLimit(limit, periodLength);

    const now = this.clock.now();
    const existing = state.limits.get(normalized);
    const current = existing !== undefined ? effectiveConfig(existing, now) : undefined;
    const config: SpendingLimitConfig = current !== undefined
      ? {
          ...current,
          limit,
          periodLength,
          spent: current.spent > limit ? limit : current.spent,
          enabled: true,
        }
      : {
          asset: normalized,
          limit,
          periodLength,
          spent: 0n,
          periodStart: now,
          enabled: true,
        };

    state.limits.set(normalized, config);
    this.emit({ type: "limit_set", account: owner, asset: normalized, limit, periodLength, timestamp: now });
    this.logger.info(
      { account: owner, asset: normalized, limit: limit.toString(), periodLength },
      "Spending limit set",
    );
    return config;
  }

  removeSpendingLimit(caller: Address, account: Address, asset: Address): void {
    const owner = normalizeAddress(account);
    const state = this.requireAdmin(caller, owner);
    const normalized = normalizeAddress(asset);
    if (!state.limits.delete(normalized)) {
      throw new SpendingLimitError(
        "INVALID_CONFIG",
        `No spending limit for asset ${normalized} on ${owner}`,
      );
    }
    this.emit({ type: "limit_removed", account: owner, asset: normalized, timestamp: this.clock.now() });
    this.logger.info({ account: owner, asset: normalized }, "Spending limit removed");
  }

  /**
   * Start a new period, but only once the current one has elapsed.
   *
   * @returns true when a reset happened
   */
  resetPeriod(caller: Address, account: Address, asset: Address): boolean {
    const owner = normalizeAddress(account);
    const state = this.requireAdmin(caller, owner);
    const normalized = normalizeAddress(asset);
    const config = state.limits.get(normalized);
    if (config === undefined) {
      throw new SpendingLimitError(
        "INVALID_CONFIG",
        `No spending limit for asset ${normalized} on ${owner}`,
      );
    }

    const now = this.clock.now();
    if (!periodElapsed(config, now)) {
      return false;
    }
    state.limits.set(normalized, effectiveConfig(config, now));
    this.emit({ type: "period_reset", account: owner, asset: normalized, timestamp: now });
    return true;
  }

  setWhitelist(caller: Address, account: Address, target: Address, allowed: boolean): void {
    const owner = normalizeAddress(account);
    const state = this.requireAdmin(caller, owner);
    const normalized = normalizeAddress(target);
    if (allowed) {
      state.whitelist.add(normalized);
    } else {
      state.whitelist.delete(normalized);
    }
    this.emit({
      type: "whitelist_updated",
      account: owner,
      address: normalized,
      allowed,
      timestamp: this.clock.now(),
    });
  }

  pause(caller: Address, account: Address): void {
    this.setPaused(caller, normalizeAddress(account), true);
  }

  unpause(caller: Address, account: Address): void {
    this.setPaused(caller, normalizeAddress(account), false);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Queries
  // ───────────────────────────────────────────────────────────────────────

  isInstalled(account: Address): boolean {
    return this.accounts.has(normalizeAddress(account));
  }

  /**
   * The config as of now (period reset applied), without mutating it.
   */
  getSpendingLimit(account: Address, asset: Address): SpendingLimitConfig | null {
    const config = this.accounts.get(normalizeAddress(account))?.limits.get(normalizeAddress(asset));
    return config !== undefined ? effectiveConfig(config, this.clock.now()) : null;
  }

  /**
   * Remaining quota this period; null when the asset has no limit.
   */
  getRemainingAllowance(account: Address, asset: Address): bigint | null {
    const config = this.getSpendingLimit(account, asset);
    return config !== null ? remaining(config) : null;
  }

  isWhitelisted(account: Address, target: Address): boolean {
    return this.accounts.get(normalizeAddress(account))?.whitelist.has(normalizeAddress(target)) ?? false;
  }

  isPaused(account: Address): boolean {
    return this.accounts.get(normalizeAddress(account))?.paused ?? false;
  }

  getEventHistory(): readonly SpendingLimitEvent[] {
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

  private requireState(account: Address): AccountSpendingState {
    const state = this.accounts.get(account);
    if (state === undefined) {
      throw new SpendingLimitError(
        "MODULE_STATE_ERROR",
        `${this.name} not installed for ${account}`,
      );
    }
    return state;
  }

  /**
   * Only the account itself, or its root authority when a controller is
   * wired in, may reconfigure its limits.
   */
  private requireAdmin(caller: Address, account: Address): AccountSpendingState {
    const by = normalizeAddress(caller);
    if (by !== account && (this.controller === undefined || by !== this.controller.getRootAuthority(account))) {
      this.logger.debug({ account, caller: by }, "Rejected: not the account or its root authority");
      throw new SpendingLimitError("UNAUTHORIZED", `${by} may not configure spending limits of ${account}`, {
        account,
        caller: by,
      });
    }
    return this.requireState(account);
  }

  private setPaused(caller: Address, account: Address, paused: boolean): void {
    const state = this.requireAdmin(caller, account);
    state.paused = paused;
    this.emit({ type: "pause_changed", account, paused, timestamp: this.clock.now() });
    this.logger.info({ account, paused }, paused ? "Account paused" : "Account unpaused");
  }

  private token(account: Address, spends: readonly DecodedSpend[], exempt: boolean): HookToken {
    return {
      module: this.address,
      payload: {
        account,
        exempt,
        spends: spends.map((s) => ({ asset: s.asset, amount: s.amount })),
      },
    };
  }

  private emit(event: SpendingLimitEvent): void {
    this.events.push(event);
  }
}

// =============================================================================
// Helpers
// =============================================================================

function totalsByAsset(spends: readonly DecodedSpend[]): Map<Address, bigint> {
  const totals = new Map<Address, bigint>();
  for (const spend of spends) {
    totals.set(spend.asset, (totals.get(spend.asset) ?? 0n) + spend.amount);
  }
  return totals;
}

function assertLimit(limit: bigint, periodLength: number): void {
  if (limit <= 0n) {
    throw new SpendingLimitError("INVALID_CONFIG", `Limit must be positive, got ${limit}`);
  }
  if (!Number.isSafeInteger(periodLength) || periodLength <= 0) {
    throw new SpendingLimitError(
      "INVALID_CONFIG",
      `Period length must be a positive number of seconds, got ${periodLength}`,
    );
  }
}
