/**
 * Session Integrity Monitor
 *
 * One tracked session per user (last writer wins). Every authenticated
 * request is checked for expiry and for anomalies:
 * - IP change: logged, tolerated
 * - user-agent change: fatal
 * - more than one live platform session: fatal
 */

import { randomInt } from "node:crypto";
import { z } from "zod";
import { Clock, systemClock } from "../clock";
import { EventBus } from "../eventBus";
import { toError } from "../errors";
import { SecurityEventSink } from "../events/eventSink";
import { ClientIdentityResolver, ClientRequest } from "../identity/clientIdentity";
import { formatTimestamp } from "../logger/formatters";
import { DurableStore } from "../storage/durableStore";
import { ExpiringStore } from "../storage/expiringStore";
import { KeyedMutex } from "../storage/keyedMutex";
import { TieredStore, UserFieldTier } from "../storage/tieredStore";

export const SessionStateSchema = z.object({
  userId: z.string(),
  loginTime: z.number(),
  lastActivity: z.number(),
  ipAddress: z.string(),
  userAgent: z.string(),
  sessionToken: z.string(),
  loginCount: z.number(),
});
export type SessionState = z.infer<typeof SessionStateSchema>;

/**
 * The host application's own session layer
 */
export interface SessionPlatform {
  countActiveSessions(userId: string): Promise<number>;
  /** Revoke every session of the user except `currentToken` */
  destroyOtherSessions(userId: string, currentToken?: string): Promise<void>;
  destroyAllSessions(userId: string): Promise<void>;
}

export type InvalidReason = "expired" | "user_agent_change" | "concurrent_sessions";

export type SessionValidation =
  | { valid: true }
  | { valid: false; reason: InvalidReason; forceLogout: true };

export interface SessionInfo {
  loginTime: number;
  lastActivity: number;
  ipAddress: string;
  sessionAge: number;
  timeSinceActivity: number;
  isExpired: boolean;
}

export interface SessionMonitorConfig {
  /** Idle timeout */
  sessionTimeout: number;
  /** Absolute lifetime counted from login */
  maxSessionAge: number;
}

export const DEFAULT_SESSION_CONFIG: SessionMonitorConfig = {
  sessionTimeout: 1800,
  maxSessionAge: 86_400,
};

export const SESSION_DATA_FIELD = "_session_data";
export const LOGIN_COUNT_FIELD = "_login_count";
export const LAST_ACTIVITY_FIELD = "last_activity";

const TOKEN_ALPHABET = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

export function generateSessionToken(length = 32): string {
  let token = "";
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
}

export interface SessionMonitorDeps {
  cache: ExpiringStore;
  durable: DurableStore;
  resolver: ClientIdentityResolver;
  sink: SecurityEventSink;
  platform: SessionPlatform;
  eventBus: EventBus;
  clock?: Clock;
  config?: Partial<SessionMonitorConfig>;
}

export class SessionMonitor {
  private readonly durable: DurableStore;
  private readonly resolver: ClientIdentityResolver;
  private readonly sink: SecurityEventSink;
  private readonly platform: SessionPlatform;
  private readonly eventBus: EventBus;
  private readonly clock: Clock;
  readonly config: SessionMonitorConfig;

  private readonly sessions: TieredStore<SessionState>;
  private readonly mutex = new KeyedMutex();

  constructor(deps: SessionMonitorDeps) {
    this.durable = deps.durable;
    this.resolver = deps.resolver;
    this.sink = deps.sink;
    this.platform = deps.platform;
    this.eventBus = deps.eventBus;
    this.clock = deps.clock ?? systemClock;
    this.config = { ...DEFAULT_SESSION_CONFIG, ...deps.config };

    // Each write keeps the record for a full session age past the last
    // activity, so an over-age session is still found and reported expired
    this.sessions = new TieredStore<SessionState>({
      cache: deps.cache,
      durable: new UserFieldTier(deps.durable, SESSION_DATA_FIELD, SessionStateSchema),
      schema: SessionStateSchema,
      clock: this.clock,
      expiresAt: (state) => state.lastActivity + this.config.maxSessionAge,
      cacheKey: (userId) => `session_data_${userId}`,
      onDegraded: (tier, operation, key, error) =>
        this.eventBus.emit("StorageDegradedEvent", { tier, operation, key, error: error.message }),
    });
  }

  async onLogin(userId: string, request: ClientRequest, currentToken?: string): Promise<SessionState> {
    const ipAddress = this.resolver.resolve(request);
    const userAgent = this.resolver.userAgent(request);

    const state = await this.mutex.runExclusive(userId, async () => {
      const loginCount = (await this.getLoginCount(userId)) + 1;
      const now = this.clock.now();
      const created: SessionState = {
        userId,
        loginTime: now,
        lastActivity: now,
        ipAddress,
        userAgent,
        sessionToken: generateSessionToken(),
        loginCount,
      };

      await this.store(created);
      await this.attempt("durable", "updateUserField", LOGIN_COUNT_FIELD, () =>
        this.durable.updateUserField(userId, LOGIN_COUNT_FIELD, loginCount)
      );
      return created;
    });

    // Single active session per user
    await this.attempt("platform", "destroyOtherSessions", userId, () =>
      this.platform.destroyOtherSessions(userId, currentToken ?? request.sessionToken)
    );

    await this.sink.logUserLoginAttempt({ userId, ipAddress, userAgent, success: true });
    this.eventBus.emit("SessionCreatedEvent", { userId, ip: ipAddress, loginCount: state.loginCount });
    return state;
  }

  async onLogout(userId: string): Promise<void> {
    await this.mutex.runExclusive(userId, () => this.removeState(userId));
    this.eventBus.emit("SessionEndedEvent", { userId, reason: "logout" });
  }

  async validateSession(request: ClientRequest): Promise<SessionValidation> {
    const userId = request.userId;
    if (!userId) {
      return { valid: true };
    }

    return this.mutex.runExclusive(userId, async (): Promise<SessionValidation> => {
      const read = await this.sessions.read(userId);
      if (read.status === "expired") {
        return this.invalidate(userId, "expired");
      }
      if (read.status !== "hit") {
        // Untracked (or unreadable) session: the platform's own layer governs
        return { valid: true };
      }

      const state = read.record;
      const now = this.clock.now();

      if (this.isExpired(state, now)) {
        return this.invalidate(userId, "expired");
      }

      const ip = this.resolver.resolve(request);
      const userAgent = this.resolver.userAgent(request);
      const context = { ip, userAgent };

      if (state.ipAddress !== ip) {
        await this.sink.logUserSecurityEvent(userId, "ip_change", context, {
          oldIp: state.ipAddress,
          newIp: ip,
        });
        this.eventBus.emit("SessionAnomalyEvent", { userId, anomaly: "ip_change", fatal: false });
      }

      if (state.userAgent !== userAgent) {
        await this.sink.logUserSecurityEvent(userId, "user_agent_change", context, {
          oldUa: state.userAgent,
          newUa: userAgent,
        });
        this.eventBus.emit("SessionAnomalyEvent", { userId, anomaly: "user_agent_change", fatal: true });
        return this.invalidate(userId, "user_agent_change");
      }

      if ((await this.countActiveSessions(userId)) > 1) {
        await this.sink.logUserSecurityEvent(userId, "concurrent_sessions", context, { ip });
        this.eventBus.emit("SessionAnomalyEvent", { userId, anomaly: "concurrent_sessions", fatal: true });
        return this.invalidate(userId, "concurrent_sessions");
      }

      await this.store({ ...state, lastActivity: Math.max(state.lastActivity, now) });
      await this.attempt("durable", "updateUserField", LAST_ACTIVITY_FIELD, () =>
        this.durable.updateUserField(userId, LAST_ACTIVITY_FIELD, formatTimestamp(now))
      );
      return { valid: true };
    });
  }

  async getSessionInfo(userId: string): Promise<SessionInfo | null> {
    const read = await this.sessions.read(userId);
    if (read.status !== "hit") return null;

    const state = read.record;
    const now = this.clock.now();
    return {
      loginTime: state.loginTime,
      lastActivity: state.lastActivity,
      ipAddress: state.ipAddress,
      sessionAge: now - state.loginTime,
      timeSinceActivity: now - state.lastActivity,
      isExpired: this.isExpired(state, now),
    };
  }

  async getSessionState(userId: string): Promise<SessionState | null> {
    const read = await this.sessions.read(userId);
    return read.status === "hit" ? read.record : null;
  }

  private isExpired(state: SessionState, now: number): boolean {
    return (
      now - state.lastActivity > this.config.sessionTimeout || now - state.loginTime > this.config.maxSessionAge
    );
  }

  private async invalidate(userId: string, reason: InvalidReason): Promise<SessionValidation> {
    await this.removeState(userId);
    await this.attempt("platform", "destroyAllSessions", userId, () => this.platform.destroyAllSessions(userId));
    this.eventBus.emit("SessionEndedEvent", { userId, reason });
    return { valid: false, reason, forceLogout: true };
  }

  private async store(state: SessionState): Promise<void> {
    await this.attempt("durable", "write", SESSION_DATA_FIELD, () => this.sessions.write(state.userId, state));
  }

  private async removeState(userId: string): Promise<void> {
    await this.attempt("durable", "remove", SESSION_DATA_FIELD, () => this.sessions.remove(userId));
  }

  private async getLoginCount(userId: string): Promise<number> {
    try {
      const raw = await this.durable.getUserField(userId, LOGIN_COUNT_FIELD);
      const count = typeof raw === "number" ? raw : Number.parseInt(String(raw ?? 0), 10);
      return Number.isFinite(count) && count > 0 ? count : 0;
    } catch (error: unknown) {
      this.degraded("durable", "getUserField", LOGIN_COUNT_FIELD, error);
      return 0;
    }
  }

  private async countActiveSessions(userId: string): Promise<number> {
    try {
      return await this.platform.countActiveSessions(userId);
    } catch (error: unknown) {
      this.degraded("platform", "countActiveSessions", userId, error);
      return 0;
    }
  }

  private async attempt(tier: string, operation: string, key: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error: unknown) {
      this.degraded(tier, operation, key, error);
    }
  }

  private degraded(tier: string, operation: string, key: string, error: unknown): void {
    this.eventBus.emit("StorageDegradedEvent", { tier, operation, key, error: toError(error).message });
  }
}
