/**
 * Tests for SpendingLimitHook — rolling per-asset quota.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import {
  DAY,
  HOUR,
  ManualClock,
  NATIVE_ASSET,
  EMPTY_SELECTOR,
  parseUnits,
} from "@bastion/types";
import type { AccountController, Address, Call } from "@bastion/types";
import { SpendingLimitHook } from "../src/spending-limit-hook.js";
import { SpendingLimitError } from "../src/types.js";
import { TRANSFER_SELECTOR, APPROVE_SELECTOR } from "../src/decode.js";
import { addr, expectCode } from "../../types/tests/helpers.js";

const ACCOUNT = addr(0xa1);
const HOOK = addr(0x500);
const TOKEN_X = addr(0x70);
const RECIPIENT = addr(0xbeef);
const START = 1_700_000_000;
const OWNER = addr(0x0e);
const STRANGER = addr(0xbad);

function eth(amount: string): bigint {
  return parseUnits(amount, 18);
}

function transfer(token: Address, amount: bigint): Call {
  return { target: token, value: 0n, data: { selector: TRANSFER_SELECTOR, args: [RECIPIENT, amount] } };
}

function nativeTransfer(to: Address, value: bigint): Call {
  return { target: to, value, data: { selector: EMPTY_SELECTOR, args: [] } };
}

describe("SpendingLimitHook", () => {
  let clock: ManualClock;
  let hook: SpendingLimitHook;

  beforeEach(() => {
    clock = new ManualClock(START);
    hook = new SpendingLimitHook({ address: HOOK, clock });
    hook.onInstall(ACCOUNT, {
      limits: [{ asset: TOKEN_X, limit: eth("1.0"), periodLength: DAY }],
    });
  });

  // ─── Module protocol ───────────────────────────────────────────────

  describe("module protocol", () => {
    it("reports the hook kind only", () => {
      expect(hook.isModuleType("hook")).toBe(true);
      expect(hook.isModuleType("validator")).toBe(false);
      expect(hook.isModuleType("executor")).toBe(false);
    });

    it("initializes limits from init data", () => {
      const config = hook.getSpendingLimit(ACCOUNT, TOKEN_X);
      expect(config).toEqual({
        asset: TOKEN_X,
        limit: eth("1.0"),
        periodLength: DAY,
        spent: 0n,
        periodStart: START,
        enabled: true,
      });
    });

    it("accepts string amounts and missing init data", () => {
      const other = addr(0xa2);
      hook.onInstall(other, { limits: [{ asset: TOKEN_X, limit: "500", periodLength: HOUR }] });
      expect(hook.getRemainingAllowance(other, TOKEN_X)).toBe(500n);

      const third = addr(0xa3);
      hook.onInstall(third, undefined);
      expect(hook.isInstalled(third)).toBe(true);
    });

    it("rejects a second install for the same account", () => {
      expectCode(() => hook.onInstall(ACCOUNT, {}), "MODULE_STATE_ERROR");
    });

    it("rejects malformed init data with INVALID_CONFIG", () => {
      const err = expectCode(
        () => hook.onInstall(addr(0xa4), { limits: [{ asset: "0x12", limit: 1n, periodLength: DAY }] }),
        "INVALID_CONFIG",
      );
      expect(err.message).toContain("limits.0.asset");
      expect(hook.isInstalled(addr(0xa4))).toBe(false);
    });

    it("rejects a zero limit in init data", () => {
      expectCode(
        () => hook.onInstall(addr(0xa5), { limits: [{ asset: TOKEN_X, limit: 0n, periodLength: DAY }] }),
        "INVALID_CONFIG",
      );
    });

    it("uninstall clears all account state", () => {
      hook.onUninstall(ACCOUNT, undefined);
      expect(hook.isInstalled(ACCOUNT)).toBe(false);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)).toBeNull();
      expectCode(() => hook.onUninstall(ACCOUNT, undefined), "MODULE_STATE_ERROR");
    });
  });

  // ─── Scenario: daily quota ─────────────────────────────────────────

  describe("rolling daily quota", () => {
    it("enforces the limit and resets after the period", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.6")));
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("0.4"));

      const err = expectCode(
        () => hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.5"))),
        "SPENDING_LIMIT_EXCEEDED",
      );
      expect(err).toBeInstanceOf(SpendingLimitError);
      expect(err).toMatchObject({
        details: { asset: TOKEN_X, amount: eth("0.5"), limit: eth("1.0"), available: eth("0.4") },
      });
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("0.4"));

      clock.advance(DAY + 1);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.5")));
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("0.5"));
    });

    it("accumulates within one period", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.2")));
      clock.advance(HOUR);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.3")));
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(eth("0.5"));
    });

    it("resets once, not per elapsed period", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.9")));
      clock.advance(5 * DAY + 7);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.3")));

      const config = hook.getSpendingLimit(ACCOUNT, TOKEN_X);
      expect(config?.spent).toBe(eth("0.3"));
      expect(config?.periodStart).toBe(START + 5 * DAY + 7);
    });

    it("resets exactly at the period boundary", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("1.0")));
      clock.advance(DAY - 1);
      expectCode(
        () => hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 1n)),
        "SPENDING_LIMIT_EXCEEDED",
      );
      clock.advance(1);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 1n));
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(1n);
    });

    it("allows spending exactly up to the limit", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("1.0")));
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(0n);
    });

    it("a rejected call does not persist the lazy reset", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.5")));
      clock.advance(DAY);
      const events = hook.getEventHistory().length;
      expectCode(
        () => hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("2.0"))),
        "SPENDING_LIMIT_EXCEEDED",
      );
      expect(hook.getEventHistory().length).toBe(events);
      expect(hook.resetPeriod(ACCOUNT, ACCOUNT, TOKEN_X)).toBe(true);
    });
  });

  // ─── Decoding ──────────────────────────────────────────────────────

  describe("decoding", () => {
    it("accounts native value against the native asset", () => {
      hook.setSpendingLimit(ACCOUNT, ACCOUNT, NATIVE_ASSET, 100n, DAY);
      hook.preCheck(ACCOUNT, ACCOUNT, 60n, nativeTransfer(RECIPIENT, 60n));
      expect(hook.getRemainingAllowance(ACCOUNT, NATIVE_ASSET)).toBe(40n);
    });

    it("accounts approvals like transfers", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, {
        target: TOKEN_X,
        value: 0n,
        data: { selector: APPROVE_SELECTOR, args: [RECIPIENT, eth("0.25")] },
      });
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("0.75"));
    });

    it("ignores calls that move nothing", () => {
      const token = hook.preCheck(ACCOUNT, ACCOUNT, 0n, {
        target: TOKEN_X,
        value: 0n,
        data: { selector: "0x12345678", args: [] },
      });
      expect(token.payload).toEqual({ account: ACCOUNT, exempt: false, spends: [] });
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("1.0"));
    });

    it("rejects a transfer payload without an amount", () => {
      expectCode(
        () =>
          hook.preCheck(ACCOUNT, ACCOUNT, 0n, {
            target: TOKEN_X,
            value: 0n,
            data: { selector: TRANSFER_SELECTOR, args: [RECIPIENT] },
          }),
        "INVALID_CONFIG",
      );
    });

    it("does not limit assets without a config", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(addr(0x71), eth("1000")));
      expect(hook.getRemainingAllowance(ACCOUNT, addr(0x71))).toBeNull();
    });
  });

  // ─── Whitelist and pause ───────────────────────────────────────────

  describe("whitelist and pause", () => {
    it("skips accounting for whitelisted targets", () => {
      hook.setWhitelist(ACCOUNT, ACCOUNT, TOKEN_X, true);
      const token = hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("5")));
      expect(token.payload).toMatchObject({ exempt: true });
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("1.0"));
    });

    it("skips accounting for whitelisted callers", () => {
      const treasury = addr(0x7e);
      hook.setWhitelist(ACCOUNT, ACCOUNT, treasury, true);
      expect(hook.isWhitelisted(ACCOUNT, treasury)).toBe(true);
      hook.preCheck(ACCOUNT, treasury, 0n, transfer(TOKEN_X, eth("5")));
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("1.0"));

      hook.setWhitelist(ACCOUNT, ACCOUNT, treasury, false);
      expect(hook.isWhitelisted(ACCOUNT, treasury)).toBe(false);
    });

    it("lets whitelisted calls through without decoding them", () => {
      hook.setWhitelist(ACCOUNT, ACCOUNT, TOKEN_X, true);

      const token = hook.preCheck(ACCOUNT, ACCOUNT, 0n, {
        target: TOKEN_X,
        value: 0n,
        data: { selector: TRANSFER_SELECTOR, args: [RECIPIENT] },
      });

      expect(token.payload).toEqual({ account: ACCOUNT, exempt: true, spends: [] });
    });

    it("rejects every non-whitelisted call while paused", () => {
      hook.pause(ACCOUNT, ACCOUNT);
      expect(hook.isPaused(ACCOUNT)).toBe(true);
      expectCode(
        () => hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 1n)),
        "ACCOUNT_IS_PAUSED",
      );

      hook.unpause(ACCOUNT, ACCOUNT);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 1n));
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(1n);
    });
  });

  // ─── Administration ────────────────────────────────────────────────

  describe("administration", () => {
    it("resetPeriod is a no-op mid-period", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.8")));
      clock.advance(HOUR);
      expect(hook.resetPeriod(ACCOUNT, ACCOUNT, TOKEN_X)).toBe(false);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(eth("0.8"));
    });

    it("resetPeriod starts a new period once elapsed", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.8")));
      clock.advance(DAY);
      expect(hook.resetPeriod(ACCOUNT, ACCOUNT, TOKEN_X)).toBe(true);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)).toMatchObject({
        spent: 0n,
        periodStart: START + DAY,
      });
    });

    it("updating a limit keeps the period and clamps spend", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.8")));
      const lowered = hook.setSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X, eth("0.5"), DAY);
      expect(lowered.spent).toBe(eth("0.5"));
      expect(lowered.periodStart).toBe(START);

      const raised = hook.setSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X, eth("2.0"), DAY);
      expect(raised.spent).toBe(eth("0.5"));
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("1.5"));
    });

    it("rejects invalid limits", () => {
      expectCode(() => hook.setSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X, 0n, DAY), "INVALID_CONFIG");
      expectCode(() => hook.setSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X, 1n, 0), "INVALID_CONFIG");
    });

    it("removes limits", () => {
      hook.removeSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)).toBeNull();
      expectCode(() => hook.removeSpendingLimit(ACCOUNT, ACCOUNT, TOKEN_X), "INVALID_CONFIG");
    });

    it("requires the hook to be installed", () => {
      expectCode(() => hook.pause(addr(0xdead), addr(0xdead)), "MODULE_STATE_ERROR");
      expectCode(
        () => hook.preCheck(addr(0xdead), ACCOUNT, 0n, transfer(TOKEN_X, 1n)),
        "MODULE_STATE_ERROR",
      );
    });
  });

  // ─── Authorization ─────────────────────────────────────────────────

  describe("authorization", () => {
    const adminCalls: [string, (caller: Address) => unknown][] = [
      ["setSpendingLimit", (caller) => hook.setSpendingLimit(caller, ACCOUNT, TOKEN_X, eth("50"), DAY)],
      ["removeSpendingLimit", (caller) => hook.removeSpendingLimit(caller, ACCOUNT, TOKEN_X)],
      ["resetPeriod", (caller) => hook.resetPeriod(caller, ACCOUNT, TOKEN_X)],
      ["setWhitelist", (caller) => hook.setWhitelist(caller, ACCOUNT, RECIPIENT, true)],
      ["pause", (caller) => hook.pause(caller, ACCOUNT)],
      ["unpause", (caller) => hook.unpause(caller, ACCOUNT)],
    ];

    it.each(adminCalls)("%s rejects a stranger", (_name, call) => {
      const events = hook.getEventHistory().length;

      expectCode(() => call(STRANGER), "UNAUTHORIZED");

      expect(hook.getEventHistory()).toHaveLength(events);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.limit).toBe(eth("1.0"));
      expect(hook.isWhitelisted(ACCOUNT, RECIPIENT)).toBe(false);
      expect(hook.isPaused(ACCOUNT)).toBe(false);
    });

    it("rejects the root authority without a controller", () => {
      expectCode(() => hook.pause(OWNER, ACCOUNT), "UNAUTHORIZED");
    });

    it("accepts the root authority reported by the controller", () => {
      const controller: AccountController = {
        getRootAuthority: () => OWNER,
        setRootAuthority: vi.fn(),
      };
      const governed = new SpendingLimitHook({ address: HOOK, clock, controller });
      governed.onInstall(ACCOUNT, {});

      governed.setSpendingLimit(OWNER, ACCOUNT, NATIVE_ASSET, 100n, DAY);
      governed.pause(OWNER, ACCOUNT);

      expect(governed.getRemainingAllowance(ACCOUNT, NATIVE_ASSET)).toBe(100n);
      expect(governed.isPaused(ACCOUNT)).toBe(true);
      expectCode(() => governed.unpause(STRANGER, ACCOUNT), "UNAUTHORIZED");
    });
  });

  // ─── Address normalization ─────────────────────────────────────────

  describe("mixed-case account addresses", () => {
    const MIXED: Address = `0x${ACCOUNT.slice(2).toUpperCase()}`;

    it("resolve to the installed account", () => {
      hook.preCheck(MIXED, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.3")));
      hook.setWhitelist(MIXED, MIXED, RECIPIENT, true);

      expect(hook.isInstalled(MIXED)).toBe(true);
      expect(hook.getRemainingAllowance(ACCOUNT, TOKEN_X)).toBe(eth("0.7"));
      expect(hook.getRemainingAllowance(MIXED, TOKEN_X)).toBe(eth("0.7"));
      expect(hook.isWhitelisted(ACCOUNT, RECIPIENT)).toBe(true);
    });

    it("cannot install twice under another spelling", () => {
      expectCode(() => hook.onInstall(MIXED, {}), "MODULE_STATE_ERROR");
    });
  });

  // ─── Hook tokens and checkpoints ───────────────────────────────────

  describe("postCheck and checkpoint", () => {
    it("postCheck does not roll back recorded spend", () => {
      const token = hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.4")));
      hook.postCheck(ACCOUNT, token);
      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(eth("0.4"));
    });

    it("postCheck rejects another module's token", () => {
      expectCode(
        () => hook.postCheck(ACCOUNT, { module: addr(0x501), payload: {} }),
        "MODULE_STATE_ERROR",
      );
    });

    it("rollback restores spend and events", () => {
      const rollback = hook.checkpoint();
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, eth("0.4")));
      hook.pause(ACCOUNT, ACCOUNT);
      rollback();

      expect(hook.getSpendingLimit(ACCOUNT, TOKEN_X)?.spent).toBe(0n);
      expect(hook.isPaused(ACCOUNT)).toBe(false);
      expect(hook.getEventHistory()).toEqual([]);
    });

    it("records events for spend and resets", () => {
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 10n));
      clock.advance(DAY);
      hook.preCheck(ACCOUNT, ACCOUNT, 0n, transfer(TOKEN_X, 20n));

      expect(hook.getEventHistory().map((e) => e.type)).toEqual([
        "spend_recorded",
        "period_reset",
        "spend_recorded",
      ]);
    });
  });
});
