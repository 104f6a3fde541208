/**
 * Brute-Force Guard
 *
 * Per-identity state machine:
 *   NORMAL     --failures >= maxAttempts-->  LOCKED_OUT (lockout count + 1)
 *   LOCKED_OUT --lockout count >= maxLockouts--> BANNED
 *   LOCKED_OUT / BANNED --duration elapses--> NORMAL
 *   any        --manual ban--> BANNED,  BANNED --manual unban--> NORMAL
 *
 * Bans live in a tiered store: the durable registry is authoritative and a
 * cache miss re-seeds the cache with the remaining ban time only.
 */

import { Clock, systemClock } from "../clock";
import { EventBus } from "../eventBus";
import { StorageError, ValidationError, toError } from "../errors";
import { SecurityEventSink } from "../events/eventSink";
import { ClientIdentityResolver, ClientRequest, RequestLifecycle, isValidIp } from "../identity/clientIdentity";
import { formatTimestamp } from "../logger/formatters";
import { AdminNotifier } from "../notify/notifier";
import { DurableStore } from "../storage/durableStore";
import { ExpiringStore } from "../storage/expiringStore";
import { KeyedMutex } from "../storage/keyedMutex";
import { OptionMapTier, TieredStore } from "../storage/tieredStore";
import {
  AdminResult,
  AttemptRecord,
  AttemptRecordSchema,
  AUTOMATIC_BAN_REASON,
  BanRecord,
  BanRecordSchema,
  BruteForceConfig,
  DEFAULT_BRUTE_FORCE_CONFIG,
  GuardState,
  IpBanCheck,
  LockoutState,
  LockoutStateSchema,
  LoginRejection,
  SecurityStats,
  isLoginRejection,
} from "./types";

export const BANNED_IPS_OPTION = "banned_ips";
export const ACTIVE_LOCKOUTS_OPTION = "active_lockouts";

export const BANNED_MESSAGE =
  "Your IP address has been banned due to too many failed login attempts. Please try again later.";
export const ACCESS_DENIED_MESSAGE = "Access Denied: Your IP address has been banned due to suspicious activity.";

export interface BruteForceGuardDeps {
  cache: ExpiringStore;
  durable: DurableStore;
  resolver: ClientIdentityResolver;
  sink: SecurityEventSink;
  notifier: AdminNotifier;
  eventBus: EventBus;
  clock?: Clock;
  config?: Partial<BruteForceConfig>;
}

type BanLookup =
  | { banned: true; remaining: number; record?: BanRecord }
  | { banned: false };

export class BruteForceGuard {
  private readonly cache: ExpiringStore;
  private readonly resolver: ClientIdentityResolver;
  private readonly sink: SecurityEventSink;
  private readonly notifier: AdminNotifier;
  private readonly eventBus: EventBus;
  private readonly clock: Clock;
  readonly config: BruteForceConfig;

  private readonly bans: TieredStore<BanRecord>;
  private readonly lockouts: TieredStore<LockoutState>;
  private readonly mutex = new KeyedMutex();

  constructor(deps: BruteForceGuardDeps) {
    this.cache = deps.cache;
    this.resolver = deps.resolver;
    this.sink = deps.sink;
    this.notifier = deps.notifier;
    this.eventBus = deps.eventBus;
    this.clock = deps.clock ?? systemClock;
    this.config = { ...DEFAULT_BRUTE_FORCE_CONFIG, ...deps.config };

    const onDegraded = (tier: "cache" | "durable", operation: string, key: string, error: Error) =>
      this.eventBus.emit("StorageDegradedEvent", { tier, operation, key, error: error.message });

    this.bans = new TieredStore<BanRecord>({
      cache: deps.cache,
      durable: new OptionMapTier(deps.durable, BANNED_IPS_OPTION, BanRecordSchema),
      schema: BanRecordSchema,
      clock: this.clock,
      expiresAt: (ban) => ban.startedAt + ban.duration,
      cacheKey: (ip) => `banned_ip_${ip}`,
      onDegraded,
    });

    // The durable copy doubles as the index behind the active-lockout count
    this.lockouts = new TieredStore<LockoutState>({
      cache: deps.cache,
      durable: new OptionMapTier(deps.durable, ACTIVE_LOCKOUTS_OPTION, LockoutStateSchema),
      schema: LockoutStateSchema,
      clock: this.clock,
      expiresAt: (lockout) => lockout.startedAt + lockout.duration,
      cacheKey: (ip) => `lockout_${ip}`,
      onDegraded,
    });
  }

  /**
   * Failed login hook. Records the attempt and escalates to lockout/ban.
   */
  async onLoginFailed(username: string, request: ClientRequest): Promise<GuardState> {
    const ip = this.resolver.resolve(request);
    const userAgent = this.resolver.userAgent(request);

    const state = await this.mutex.runExclusive(ip, async (): Promise<GuardState> => {
      await this.recordFailedAttempt(ip, username, userAgent);

      const attempts = await this.getFailedAttempts(ip);
      if (attempts < this.config.maxAttempts) {
        return { state: "normal" };
      }

      // A running lockout is never restarted or extended
      const current = await this.lockoutRemaining(ip);
      if (current > 0) {
        return { state: "locked_out", remaining: current };
      }

      const lockoutCount = await this.lockoutIp(ip, attempts);
      if (lockoutCount >= this.config.maxLockouts) {
        const ban = await this.banIp(ip, AUTOMATIC_BAN_REASON, this.config.banDuration, false, userAgent);
        request.lifecycle?.confirmedBans.add(ip);
        return { state: "banned", remaining: ban.duration, record: ban };
      }
      return { state: "locked_out", remaining: this.config.lockoutDuration };
    });

    await this.sink.logLoginAttempt({ ip, username, success: false, userAgent });
    this.eventBus.emit("LoginFailedEvent", { ip, username, state: state.state });
    return state;
  }

  /**
   * Successful login hook. Clears failure history only; lockout count and bans stand.
   */
  async onLoginSuccess(username: string, request: ClientRequest): Promise<void> {
    const ip = this.resolver.resolve(request);
    try {
      await this.cache.delete(this.attemptsKey(ip));
    } catch (error: unknown) {
      this.degraded("delete", this.attemptsKey(ip), error);
    }
    await this.sink.logLoginAttempt({ ip, username, success: true, userAgent: this.resolver.userAgent(request) });
    this.eventBus.emit("LoginSucceededEvent", { ip, username });
  }

  /**
   * Pre-authentication gate. Anything that is already a rejection, or has
   * empty credentials, passes through untouched.
   */
  async checkLoginAttempt<U>(
    candidate: U | LoginRejection | null,
    username: string,
    password: string,
    request: ClientRequest
  ): Promise<U | LoginRejection | null> {
    if (isLoginRejection(candidate) || !username || !password) {
      return candidate;
    }

    const ip = this.resolver.resolve(request);

    const ban = await this.lookupBan(ip, request.lifecycle);
    if (ban.banned) {
      return new LoginRejection("ip_banned", BANNED_MESSAGE, "banned");
    }

    const remaining = await this.lockoutRemaining(ip);
    if (remaining > 0) {
      return new LoginRejection(
        "ip_locked_out",
        `Too many failed login attempts. Please try again in ${Math.ceil(remaining / 60)} minutes.`,
        "locked_out",
        remaining
      );
    }

    return candidate;
  }

  /**
   * Request-time gate, independent of the login flow
   */
  async checkIpBan(request: ClientRequest): Promise<IpBanCheck> {
    const ip = this.resolver.resolve(request);
    const ban = await this.lookupBan(ip, request.lifecycle);
    if (!ban.banned) {
      return { blocked: false };
    }

    await this.sink.logBlockedAttempt({
      ip,
      userAgent: this.resolver.userAgent(request),
      requestUri: request.path ?? "",
    });
    this.eventBus.emit("BlockedRequestEvent", { ip, path: request.path });
    return { blocked: true, status: 403, message: ACCESS_DENIED_MESSAGE };
  }

  async isBanned(ip: string, lifecycle?: RequestLifecycle): Promise<boolean> {
    return (await this.lookupBan(ip, lifecycle)).banned;
  }

  async isLockedOut(ip: string): Promise<boolean> {
    return (await this.lockoutRemaining(ip)) > 0;
  }

  async getState(ip: string, lifecycle?: RequestLifecycle): Promise<GuardState> {
    const ban = await this.lookupBan(ip, lifecycle);
    if (ban.banned) {
      return { state: "banned", remaining: ban.remaining, record: ban.record };
    }
    const remaining = await this.lockoutRemaining(ip);
    if (remaining > 0) {
      return { state: "locked_out", remaining };
    }
    return { state: "normal" };
  }

  async manualBanIp(ip: string, reason = "Manual ban", duration?: number): Promise<AdminResult<BanRecord>> {
    if (!isValidIp(ip)) {
      return { ok: false, error: new ValidationError(`invalid IP address "${ip}"`, { ip }) };
    }
    const banDuration = duration ?? this.config.banDuration;
    if (!Number.isInteger(banDuration) || banDuration <= 0) {
      return { ok: false, error: new ValidationError("ban duration must be a positive number of seconds", { duration }) };
    }

    const record = await this.mutex.runExclusive(ip, () => this.banIp(ip, reason, banDuration, true));
    return { ok: true, value: record };
  }

  async manualUnbanIp(ip: string): Promise<AdminResult> {
    if (!isValidIp(ip)) {
      return { ok: false, error: new ValidationError(`invalid IP address "${ip}"`, { ip }) };
    }

    try {
      await this.mutex.runExclusive(ip, () => this.bans.remove(ip));
    } catch (error: unknown) {
      this.degraded("remove", BANNED_IPS_OPTION, error, "durable");
      return { ok: false, error: new StorageError("failed to lift ban", "remove", ip, toError(error)) };
    }
    await this.sink.logSecurityEvent(ip, "manual_unban");
    this.eventBus.emit("UnbanEvent", { ip });
    return { ok: true, value: undefined };
  }

  /**
   * Valid bans in the durable registry, keyed by identity
   */
  async listBans(): Promise<Record<string, BanRecord>> {
    try {
      return await this.bans.listValid();
    } catch (error: unknown) {
      this.degraded("list", BANNED_IPS_OPTION, error, "durable");
      return {};
    }
  }

  async getSecurityStats(): Promise<SecurityStats> {
    const [loginAttempts, blocked, events, bans, lockouts] = await Promise.all([
      this.sink.getLoginAttempts(),
      this.sink.getBlockedAttempts(),
      this.sink.getSecurityEvents(),
      this.listBans(),
      this.listActiveLockouts(),
    ]);

    const cutoff = this.clock.now() - 86_400;
    const failedAttempts24h = loginAttempts.filter((a) => !a.success && a.timestamp > cutoff).length;

    return {
      totalLoginAttempts: loginAttempts.length,
      failedAttempts24h,
      blockedAttempts: blocked.length,
      securityEvents: events.length,
      bannedIps: Object.keys(bans).length,
      activeLockouts: Object.keys(lockouts).length,
    };
  }

  async listActiveLockouts(): Promise<Record<string, LockoutState>> {
    try {
      return await this.lockouts.listValid();
    } catch (error: unknown) {
      this.degraded("list", ACTIVE_LOCKOUTS_OPTION, error, "durable");
      return {};
    }
  }

  /** Lockouts recorded for `ip` in the rolling lockout-count window */
  async getLockoutCount(ip: string): Promise<number> {
    try {
      const value = await this.cache.get(this.lockoutCountKey(ip));
      return typeof value === "number" ? value : 0;
    } catch (error: unknown) {
      this.degraded("get", this.lockoutCountKey(ip), error);
      return 0;
    }
  }

  /** Failures for `ip` inside the counting window */
  async getFailedAttempts(ip: string): Promise<number> {
    const cutoff = this.clock.now() - this.config.attemptWindow;
    const attempts = await this.readAttempts(ip);
    return attempts.filter((a) => a.timestamp > cutoff).length;
  }

  private async recordFailedAttempt(ip: string, username: string, userAgent: string): Promise<void> {
    const now = this.clock.now();
    const cutoff = now - this.config.attemptRetention;
    const attempts = await this.readAttempts(ip);
    attempts.push({ username, timestamp: now, userAgent });
    const kept = attempts.filter((a) => a.timestamp > cutoff);
    try {
      await this.cache.set(this.attemptsKey(ip), kept, this.config.attemptRetention);
    } catch (error: unknown) {
      this.degraded("set", this.attemptsKey(ip), error);
    }
  }

  private async readAttempts(ip: string): Promise<AttemptRecord[]> {
    let raw: unknown;
    try {
      raw = await this.cache.get(this.attemptsKey(ip));
    } catch (error: unknown) {
      this.degraded("get", this.attemptsKey(ip), error);
      return [];
    }
    const parsed = AttemptRecordSchema.array().safeParse(raw ?? []);
    return parsed.success ? parsed.data : [];
  }

  /**
   * @returns the lockout count after this lockout
   */
  private async lockoutIp(ip: string, attempts: number): Promise<number> {
    const lockout: LockoutState = { startedAt: this.clock.now(), duration: this.config.lockoutDuration };
    try {
      await this.lockouts.write(ip, lockout);
    } catch (error: unknown) {
      this.degraded("write", ACTIVE_LOCKOUTS_OPTION, error, "durable");
    }

    let count: number;
    try {
      count = await this.cache.increment(this.lockoutCountKey(ip), this.config.lockoutCountWindow);
    } catch (error: unknown) {
      this.degraded("increment", this.lockoutCountKey(ip), error);
      count = 0;
    }

    await this.sink.logSecurityEvent(ip, "lockout", { ...lockout, attempts, lockoutCount: count });
    this.eventBus.emit("LockoutEvent", { ip, attempts, lockoutCount: count, duration: lockout.duration });
    return count;
  }

  private async banIp(
    ip: string,
    reason: string,
    duration: number,
    manual: boolean,
    userAgent = ""
  ): Promise<BanRecord> {
    const ban: BanRecord = { identity: ip, startedAt: this.clock.now(), duration, reason, manual };
    try {
      await this.bans.write(ip, ban);
    } catch (error: unknown) {
      // The cache copy is already in place; the durable copy is retried by the next ban
      this.degraded("write", BANNED_IPS_OPTION, error, "durable");
    }

    await this.sink.logSecurityEvent(ip, manual ? "manual_ban" : "ban", { ...ban });
    this.eventBus.emit("BanEvent", { ip, reason, duration, manual });

    if (!manual) {
      this.notifier.notify(
        `IP Address Banned: ${ip}`,
        [
          "An IP address has been automatically banned due to suspicious activity:",
          "",
          `IP Address: ${ip}`,
          `Ban Time: ${formatTimestamp(ban.startedAt)}`,
          `Duration: ${ban.duration / 3600} hours`,
          `Reason: ${ban.reason}`,
          `User Agent: ${userAgent}`,
        ].join("\n")
      );
    }
    return ban;
  }

  private async lookupBan(ip: string, lifecycle?: RequestLifecycle): Promise<BanLookup> {
    const read = await this.bans.read(ip);
    switch (read.status) {
      case "hit":
        lifecycle?.confirmedBans.add(ip);
        return { banned: true, remaining: read.remaining, record: read.record };
      case "miss":
      case "expired":
        return { banned: false };
      case "unavailable":
        // Fail closed only for a ban this request has already seen
        return lifecycle?.confirmedBans.has(ip) ? { banned: true, remaining: 0 } : { banned: false };
    }
  }

  private async lockoutRemaining(ip: string): Promise<number> {
    const read = await this.lockouts.read(ip);
    return read.status === "hit" ? read.remaining : 0;
  }

  private attemptsKey(ip: string): string {
    return `failed_attempts_${ip}`;
  }

  private lockoutCountKey(ip: string): string {
    return `lockout_count_${ip}`;
  }

  private degraded(operation: string, key: string, error: unknown, tier: "cache" | "durable" = "cache"): void {
    this.eventBus.emit("StorageDegradedEvent", { tier, operation, key, error: toError(error).message });
  }
}
