#!/usr/bin/env node
/**
 * @bastion/demo — Interactive CLI walkthrough.
 *
 * Runs the engine end to end in your terminal:
 * spending quota -> guardian recovery -> emergency escape -> delegation expiry
 *
 * Uses real domain packages directly, on a manual clock.
 */

import chalk from "chalk";
import {
  AccountCore,
  createLogger,
  loadConfig,
  toPolicy,
} from "@bastion/account";
import {
  DAY,
  EMPTY_SELECTOR,
  HOUR,
  ManualClock,
  NATIVE_ASSET,
  ROOT_VALIDATION_ID,
  formatUnits,
  isBastionError,
  parseUnits,
  validationIdOf,
} from "@bastion/types";
import type { Address, Call, CallDispatcher, ExecutionResult } from "@bastion/types";
import { DelegationRegistry } from "@bastion/delegation";
import { GuardianRecoveryValidator } from "@bastion/recovery";
import { SpendingLimitHook } from "@bastion/spending-limit";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function address(n: number): Address {
  return `0x${n.toString(16).padStart(40, "0")}`;
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                      BASTION DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Account Authorization and Recovery Engine         ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(16)) + chalk.white(value));
}

function rejected(msg: string, err: unknown): void {
  const code = isBastionError(err) ? err.code : "UNKNOWN";
  console.log(chalk.red("    ✗ ") + chalk.white(msg) + chalk.gray("  ") + chalk.yellow(code));
}

function eth(value: bigint): string {
  return `${formatUnits(value, 18)} ETH`;
}

/**
 * Run `fn`, reporting the engine's refusal instead of failing the demo.
 */
function expectRefusal(msg: string, fn: () => unknown): void {
  try {
    fn();
  } catch (err) {
    if (!isBastionError(err)) {
      throw err;
    }
    rejected(msg, err);
    return;
  }
  throw new Error(`Expected refusal: ${msg}`);
}

/**
 * Records effects instead of performing them.
 */
class ConsoleDispatcher implements CallDispatcher {
  count = 0;

  dispatch(_account: Address, call: Call): ExecutionResult {
    this.count++;
    return { success: true, returnData: `call#${this.count} -> ${call.target.slice(0, 10)}…` };
  }
}

const TOTAL_STEPS = 6;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  const config = loadConfig();
  const policy = toPolicy(config);
  const logger = createLogger(config);

  banner();
  console.log(chalk.gray("  Walk-through of one smart account under attack and recovery."));
  console.log(chalk.gray("  Every step uses real domain packages on a simulated clock.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Boot ───────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Boot");

  const OWNER = address(0xa11ce);
  const EMERGENCY = address(0xe11e);
  const NEW_OWNER = address(0xb0b);
  const EMERGENCY_OWNER = address(0xcafe);
  const AGENT = address(0xa9e17);
  const GUARDIANS = [address(0x91), address(0x92), address(0x93)];
  const RECIPIENT = address(0x7e57);

  const clock = new ManualClock(1_700_000_000);
  const dispatcher = new ConsoleDispatcher();
  const core = new AccountCore({
    clock,
    dispatcher,
    entryPoint: policy.entryPoint,
    emergencyDelay: policy.emergencyDelay,
    logger,
  });
  const registry = new DelegationRegistry({
    address: address(0x1001),
    clock,
    host: core,
    minDuration: policy.delegation.minDuration,
    maxDuration: policy.delegation.maxDuration,
    logger,
  });
  const hook = new SpendingLimitHook({ address: address(0x1002), clock, controller: core, logger });
  const recovery = new GuardianRecoveryValidator({
    address: address(0x1003),
    clock,
    controller: core,
    defaultRecoveryDelay: policy.defaultRecoveryDelay,
    logger,
  });
  ok("Engine initialized (account core, delegation, spending limits, recovery)");

  const account = core.createAccount({ rootAuthority: OWNER, emergencyRecoveryIdentity: EMERGENCY }).address;
  info("account", account);
  info("root", OWNER);
  info("emergency delay", `${policy.emergencyDelay / DAY} days`);

  await sleep(DELAY_MS);

  // ─── Step 2: Install Modules ────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Install Modules");

  core.installModule(OWNER, account, "hook", hook, {
    limits: [{ asset: NATIVE_ASSET, limit: parseUnits("1.0", 18), periodLength: DAY }],
  });
  ok("Spending limit hook: 1.0 ETH per day");

  core.installModule(OWNER, account, "validator", recovery, {
    guardians: GUARDIANS,
    threshold: 2,
    recoveryDelay: 48 * HOUR,
  });
  ok("Guardian recovery: 2 of 3, 48h delay");

  core.installModule(OWNER, account, "validator", registry);
  ok("Delegation registry");

  await sleep(DELAY_MS);

  // ─── Step 3: Daily Quota ────────────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Daily Quota");

  const send = (value: string): Call => ({
    target: RECIPIENT,
    value: parseUnits(value, 18),
    data: { selector: EMPTY_SELECTOR, args: [] },
  });

  core.execute(OWNER, account, { call: send("0.6"), validationId: ROOT_VALIDATION_ID });
  ok("Sent 0.6 ETH");
  info("remaining", eth(hook.getRemainingAllowance(account, NATIVE_ASSET) ?? 0n));

  expectRefusal("Sending 0.5 ETH in the same day", () =>
    core.execute(OWNER, account, { call: send("0.5"), validationId: ROOT_VALIDATION_ID }),
  );

  clock.advance(DAY + 1);
  core.execute(OWNER, account, { call: send("0.5"), validationId: ROOT_VALIDATION_ID });
  ok("A day later: sent 0.5 ETH");
  info("remaining", eth(hook.getRemainingAllowance(account, NATIVE_ASSET) ?? 0n));

  await sleep(DELAY_MS);

  // ─── Step 4: Guardian Recovery ──────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Guardian Recovery");

  const [g1, g2] = GUARDIANS;
  if (g1 === undefined || g2 === undefined) {
    throw new Error("Demo needs two guardians");
  }

  recovery.initiateRecovery(g1, account, NEW_OWNER);
  ok(`Guardian ${g1.slice(0, 8)}… proposed ${NEW_OWNER.slice(0, 8)}…`);
  recovery.approveRecovery(g1, account);
  recovery.approveRecovery(g2, account);
  ok("2 of 3 approvals collected");

  expectRefusal("Executing before the delay", () => recovery.executeRecovery(g1, account));

  clock.advance(48 * HOUR + 1);
  recovery.executeRecovery(g1, account);
  ok("Recovery executed after 48h");
  info("root", core.getRootAuthority(account));

  expectRefusal("Old owner tries to spend", () =>
    core.execute(OWNER, account, { call: send("0.1"), validationId: ROOT_VALIDATION_ID }),
  );

  await sleep(DELAY_MS);

  // ─── Step 5: Emergency Escape ───────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Emergency Escape");

  expectRefusal("Emergency takeover while the account is active", () =>
    core.emergencyRecovery(EMERGENCY, account, EMERGENCY_OWNER),
  );

  const unlock = core.emergencyUnlockTime(account);
  info("unlocks at", new Date(unlock * 1000).toISOString());
  clock.set(unlock);
  core.emergencyRecovery(EMERGENCY, account, EMERGENCY_OWNER);
  ok(`Emergency identity installed ${EMERGENCY_OWNER.slice(0, 8)}… after inactivity`);

  await sleep(DELAY_MS);

  // ─── Step 6: Delegation Expiry ──────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Delegation Expiry");

  const delegation = registry.createDelegation(EMERGENCY_OWNER, {
    delegatee: AGENT,
    kind: "full",
    duration: HOUR,
    spendingLimit: parseUnits("0.2", 18),
  });
  info("delegation", `${delegation.id.slice(0, 18)}…`);
  info("status", registry.getStatus(delegation.id));

  core.execute(AGENT, account, {
    call: send("0.1"),
    validationId: validationIdOf(registry.address),
    delegationId: delegation.id,
  });
  ok("Agent spent 0.1 ETH under its delegation");
  info("left", eth(registry.remainingAllowance(delegation.id) ?? 0n));

  clock.advance(HOUR + 1);
  info("status", registry.getStatus(delegation.id));
  expectRefusal("Agent acts after expiry", () =>
    core.execute(AGENT, account, {
      call: send("0.05"),
      validationId: validationIdOf(registry.address),
      delegationId: delegation.id,
    }),
  );

  // ─── Summary ────────────────────────────────────────────────────────

  console.log();
  console.log(chalk.white("    Account events:      ") + chalk.cyan.bold(String(core.getEventHistory(account).length)));
  console.log(chalk.white("    Effects dispatched:  ") + chalk.cyan.bold(String(dispatcher.count)));
  console.log(chalk.white("    Root authority:      ") + chalk.yellow(core.getRootAuthority(account)));
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
