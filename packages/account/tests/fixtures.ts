/**
 * In-process stand-ins for the world around an account.
 */

import { BastionError } from "@bastion/types";
import type {
  Address,
  Call,
  CallDispatcher,
  ExecutionResult,
  Hex,
  Hex32,
  HookModule,
  HookToken,
  Module,
  ModuleKind,
  Revertible,
  Rollback,
  ValidationContext,
  ValidatorModule,
} from "@bastion/types";

export class RecordingDispatcher implements CallDispatcher {
  readonly calls: { account: Address; call: Call }[] = [];
  result: ExecutionResult = { success: true, returnData: "ok" };
  onDispatch: ((account: Address, call: Call) => void) | undefined = undefined;

  dispatch(account: Address, call: Call): ExecutionResult {
    this.calls.push({ account, call });
    this.onDispatch?.(account, call);
    return this.result;
  }
}

abstract class StubModule implements Module {
  readonly installed: Address[] = [];
  failInstall = false;

  constructor(
    readonly address: Address,
    readonly name: string,
    private readonly kind: ModuleKind,
  ) {}

  isModuleType(kind: ModuleKind): boolean {
    return kind === this.kind;
  }

  onInstall(account: Address, _initData: unknown): void {
    if (this.failInstall) {
      throw new BastionError("INVALID_CONFIG", `${this.name} refused init`);
    }
    this.installed.push(account);
  }

  onUninstall(account: Address, _deinitData: unknown): void {
    this.installed.splice(this.installed.indexOf(account), 1);
  }
}

/**
 * Counts preChecks; can be told to reject. Log entries go to `log`.
 */
export class CountingHook extends StubModule implements HookModule, Revertible {
  count = 0;
  reject = false;

  constructor(
    address: Address,
    name: string,
    private readonly log: string[] = [],
  ) {
    super(address, name, "hook");
  }

  preCheck(_account: Address, _caller: Address, _value: bigint, _call: Call): HookToken {
    if (this.reject) {
      throw new BastionError("SPENDING_LIMIT_EXCEEDED", `${this.name} rejected`);
    }
    this.count++;
    this.log.push(`pre:${this.name}`);
    return { module: this.address, payload: { count: this.count } };
  }

  postCheck(_account: Address, _token: HookToken): void {
    this.log.push(`post:${this.name}`);
  }

  checkpoint(): Rollback {
    const count = this.count;
    return () => {
      this.count = count;
    };
  }
}

export class StubValidator extends StubModule implements ValidatorModule {
  accept = true;
  readonly seen: ValidationContext[] = [];

  constructor(address: Address) {
    super(address, "StubValidator", "validator");
  }

  validateOperation(_account: Address, context: ValidationContext): boolean {
    this.seen.push(context);
    return this.accept;
  }

  isValidSignature(_account: Address, _hash: Hex32, signature: Hex): boolean {
    return signature === "0x5151";
  }
}

export class StubExecutor extends StubModule {
  constructor(address: Address) {
    super(address, "StubExecutor", "executor");
  }
}
