/**
 * @bastion/recovery — Guardian threshold recovery of an account's root authority.
 */

export {
  GuardianRecoveryValidator,
  GuardianRecoveryInitSchema,
  MIN_THRESHOLD,
  DEFAULT_RECOVERY_DELAY,
} from "./guardian-recovery.js";
export type { GuardianRecoveryInitData } from "./guardian-recovery.js";
export { RecoveryError } from "./types.js";
export type {
  AccountRecoveryState,
  GuardianConfig,
  GuardianRecoveryOptions,
  RecoveryErrorCode,
  RecoveryEvent,
  RecoveryRequest,
} from "./types.js";
