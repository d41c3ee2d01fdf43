import { BastionError } from "@bastion/types";
import type { AccountController, Address } from "@bastion/types";

export interface RootChange {
  readonly caller: Address;
  readonly account: Address;
  readonly newRootAuthority: Address;
}

/**
 * In-memory AccountController: a table of root authorities.
 */
export class FakeController implements AccountController {
  readonly changes: RootChange[] = [];
  reject = false;
  private readonly roots = new Map<Address, Address>();

  constructor(entries: readonly (readonly [Address, Address])[] = []) {
    for (const [account, root] of entries) {
      this.roots.set(account, root);
    }
  }

  getRootAuthority(account: Address): Address {
    const root = this.roots.get(account);
    if (root === undefined) {
      throw new BastionError("ACCOUNT_NOT_FOUND", `Account ${account} not found`);
    }
    return root;
  }

  setRootAuthority(caller: Address, account: Address, newRootAuthority: Address): void {
    if (this.reject) {
      throw new BastionError("UNAUTHORIZED", `${caller} may not set the root authority`);
    }
    this.changes.push({ caller, account, newRootAuthority });
    this.roots.set(account, newRootAuthority);
  }
}
