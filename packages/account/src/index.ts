/**
 * @bastion/account — Account core, validation routing and configuration.
 */

export { AccountCore, DEFAULT_EMERGENCY_DELAY } from "./account-core.js";
export { ValidationManager, ROOT_SIGNING_KINDS } from "./validation-manager.js";
export { ConfigSchema, loadConfig, toPolicy, createLogger } from "./config.js";
export type { AppConfig, BastionPolicy } from "./config.js";
export { AccountError } from "./types.js";
export type {
  Account,
  AccountCoreOptions,
  AccountErrorCode,
  AccountEvent,
  AccountState,
  CreateAccountParams,
  OperationContext,
  ValidationManagerOptions,
} from "./types.js";
