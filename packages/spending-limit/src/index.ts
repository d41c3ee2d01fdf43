/**
 * @bastion/spending-limit — Rolling per-asset quota hook.
 *
 * Installed on an account as a hook module; gates every execution
 * before its effect runs. Periods reset lazily on the next read or
 * write after they elapse.
 */

export { SpendingLimitHook, SpendingLimitInitSchema } from "./spending-limit-hook.js";
export type { SpendingLimitInitData } from "./spending-limit-hook.js";
export {
  decodeSpends,
  effectiveConfig,
  periodElapsed,
  remaining,
  TRANSFER_SELECTOR,
  APPROVE_SELECTOR,
  TRANSFER_FROM_SELECTOR,
} from "./decode.js";
export { SpendingLimitError } from "./types.js";
export type {
  SpendingLimitErrorCode,
  SpendingLimitConfig,
  AccountSpendingState,
  DecodedSpend,
  SpendingLimitHookOptions,
  SpendingLimitEvent,
  LimitSetEvent,
  LimitRemovedEvent,
  SpendRecordedEvent,
  PeriodResetEvent,
  WhitelistUpdatedEvent,
  PauseChangedEvent,
} from "./types.js";
