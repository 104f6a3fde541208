export {
  BruteForceGuard,
  BANNED_IPS_OPTION,
  ACTIVE_LOCKOUTS_OPTION,
  BANNED_MESSAGE,
  ACCESS_DENIED_MESSAGE,
} from "./bruteForceGuard";
export type { BruteForceGuardDeps } from "./bruteForceGuard";
export {
  LoginRejection,
  isLoginRejection,
  DEFAULT_BRUTE_FORCE_CONFIG,
  AUTOMATIC_BAN_REASON,
  BanRecordSchema,
  LockoutStateSchema,
  AttemptRecordSchema,
} from "./types";
export type {
  BruteForceConfig,
  BanRecord,
  LockoutState,
  AttemptRecord,
  GuardState,
  BlockKind,
  IpBanCheck,
  AdminResult,
  SecurityStats,
} from "./types";
