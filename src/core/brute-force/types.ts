/**
 * Brute-force guard records and results
 */

import { z } from "zod";
import { StorageError, ValidationError } from "../errors";

export interface BruteForceConfig {
  /** Failures within `attemptWindow` that trigger a lockout */
  maxAttempts: number;
  attemptWindow: number;
  /** How long raw attempt records are kept */
  attemptRetention: number;
  lockoutDuration: number;
  /** Lockouts within `lockoutCountWindow` that escalate to a ban */
  maxLockouts: number;
  lockoutCountWindow: number;
  banDuration: number;
}

export const DEFAULT_BRUTE_FORCE_CONFIG: BruteForceConfig = {
  maxAttempts: 5,
  attemptWindow: 900,
  attemptRetention: 3600,
  lockoutDuration: 1800,
  maxLockouts: 3,
  lockoutCountWindow: 86_400,
  banDuration: 86_400,
};

export const AttemptRecordSchema = z.object({
  username: z.string(),
  timestamp: z.number(),
  userAgent: z.string(),
});
export type AttemptRecord = z.infer<typeof AttemptRecordSchema>;

export const LockoutStateSchema = z.object({
  startedAt: z.number(),
  duration: z.number(),
});
export type LockoutState = z.infer<typeof LockoutStateSchema>;

export const BanRecordSchema = z.object({
  identity: z.string(),
  startedAt: z.number(),
  duration: z.number(),
  reason: z.string(),
  manual: z.boolean(),
});
export type BanRecord = z.infer<typeof BanRecordSchema>;

export const AUTOMATIC_BAN_REASON = "Multiple lockouts due to failed login attempts";

export type GuardState =
  | { state: "normal" }
  | { state: "locked_out"; remaining: number }
  | { state: "banned"; remaining: number; record?: BanRecord };

export type BlockKind = "banned" | "locked_out";

/**
 * Returned (never thrown) by the pre-authentication gate
 */
export class LoginRejection {
  readonly ok = false;

  constructor(
    public readonly code: string,
    public readonly message: string,
    public readonly kind: BlockKind,
    public readonly retryAfter?: number
  ) {}

  get permanent(): boolean {
    return this.kind === "banned";
  }
}

export function isLoginRejection(value: unknown): value is LoginRejection {
  return value instanceof LoginRejection;
}

export type IpBanCheck =
  | { blocked: false }
  | { blocked: true; status: 403; message: string };

export type AdminResult<T = void> =
  | { ok: true; value: T }
  | { ok: false; error: ValidationError | StorageError };

export interface SecurityStats {
  totalLoginAttempts: number;
  failedAttempts24h: number;
  blockedAttempts: number;
  securityEvents: number;
  bannedIps: number;
  activeLockouts: number;
}
