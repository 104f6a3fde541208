/**
 * Security Event Sink
 *
 * Append-only ring buffers kept in the expiring store. Each append rewrites
 * the whole bounded sequence, so appends to the same key are serialized.
 */

import { z } from "zod";
import { Clock, systemClock } from "../clock";
import { EventBus } from "../eventBus";
import { toError } from "../errors";
import { formatTimestamp } from "../logger/formatters";
import { AdminNotifier } from "../notify/notifier";
import { ExpiringStore } from "../storage/expiringStore";
import { KeyedMutex } from "../storage/keyedMutex";
import {
  BlockedAttemptEntry,
  BlockedAttemptEntrySchema,
  HIGH_SEVERITY_EVENTS,
  LoginAttemptEntry,
  LoginAttemptEntrySchema,
  SecurityEventEntry,
  SecurityEventEntrySchema,
  UserLoginEntry,
  UserLoginEntrySchema,
} from "./entries";

const DAY = 86_400;
const WEEK = 7 * DAY;

export interface StreamPolicy {
  cap: number;
  ttl: number;
}

export const STREAMS = {
  loginAttempts: { cap: 100, ttl: DAY },
  userLoginAttempts: { cap: 10, ttl: DAY },
  blockedAttempts: { cap: 50, ttl: DAY },
  securityEvents: { cap: 50, ttl: WEEK },
  userSecurityEvents: { cap: 20, ttl: WEEK },
} satisfies Record<string, StreamPolicy>;

export interface UserProfile {
  displayName: string;
  email: string;
}

export interface UserDirectory {
  findUser(userId: string): Promise<UserProfile | null>;
}

export interface SecurityEventSinkDeps {
  store: ExpiringStore;
  eventBus: EventBus;
  notifier: AdminNotifier;
  clock?: Clock;
  users?: UserDirectory;
}

export class SecurityEventSink {
  private readonly store: ExpiringStore;
  private readonly eventBus: EventBus;
  private readonly notifier: AdminNotifier;
  private readonly clock: Clock;
  private readonly users?: UserDirectory;
  private readonly mutex = new KeyedMutex();

  constructor(deps: SecurityEventSinkDeps) {
    this.store = deps.store;
    this.eventBus = deps.eventBus;
    this.notifier = deps.notifier;
    this.clock = deps.clock ?? systemClock;
    this.users = deps.users;
  }

  async logLoginAttempt(entry: Omit<LoginAttemptEntry, "timestamp">): Promise<void> {
    await this.append("login_attempts", { ...entry, timestamp: this.clock.now() }, STREAMS.loginAttempts);
  }

  async logUserLoginAttempt(entry: Omit<UserLoginEntry, "timestamp">): Promise<void> {
    await this.append(
      `login_attempts_${entry.userId}`,
      { ...entry, timestamp: this.clock.now() },
      STREAMS.userLoginAttempts
    );
  }

  async logBlockedAttempt(entry: Omit<BlockedAttemptEntry, "timestamp">): Promise<void> {
    await this.append("blocked_attempts", { ...entry, timestamp: this.clock.now() }, STREAMS.blockedAttempts);
  }

  async logSecurityEvent(ip: string, eventType: string, data: Record<string, unknown> = {}): Promise<void> {
    await this.append(
      "security_events",
      { eventType, ip, timestamp: this.clock.now(), data },
      STREAMS.securityEvents
    );
  }

  /**
   * Per-user event. High-severity types also notify an administrator.
   */
  async logUserSecurityEvent(
    userId: string,
    eventType: string,
    context: { ip: string; userAgent: string },
    data: Record<string, unknown> = {}
  ): Promise<void> {
    const entry: SecurityEventEntry = {
      eventType,
      ip: context.ip,
      timestamp: this.clock.now(),
      userId,
      userAgent: context.userAgent,
      data,
    };
    await this.append(`security_events_${userId}`, entry, STREAMS.userSecurityEvents);

    if (HIGH_SEVERITY_EVENTS.includes(eventType)) {
      this.notifyHighSeverity(entry);
    }
  }

  async getLoginAttempts(): Promise<LoginAttemptEntry[]> {
    return this.read("login_attempts", LoginAttemptEntrySchema);
  }

  async getUserLoginAttempts(userId: string): Promise<UserLoginEntry[]> {
    return this.read(`login_attempts_${userId}`, UserLoginEntrySchema);
  }

  async getBlockedAttempts(): Promise<BlockedAttemptEntry[]> {
    return this.read("blocked_attempts", BlockedAttemptEntrySchema);
  }

  async getSecurityEvents(): Promise<SecurityEventEntry[]> {
    return this.read("security_events", SecurityEventEntrySchema);
  }

  async getUserSecurityEvents(userId: string): Promise<SecurityEventEntry[]> {
    return this.read(`security_events_${userId}`, SecurityEventEntrySchema);
  }

  private async append<T extends object>(key: string, entry: T, policy: StreamPolicy): Promise<void> {
    try {
      await this.mutex.runExclusive(key, async () => {
        const current = await this.store.get(key);
        const list = Array.isArray(current) ? current : [];
        list.push(entry);
        await this.store.set(key, list.slice(-policy.cap), policy.ttl);
      });
    } catch (error: unknown) {
      // Losing a log line must never block the request
      this.eventBus.emit("StorageDegradedEvent", { tier: "cache", operation: "append", key, error: toError(error).message });
    }
  }

  private async read<T>(key: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T[]> {
    let raw: unknown;
    try {
      raw = await this.store.get(key);
    } catch (error: unknown) {
      this.eventBus.emit("StorageDegradedEvent", { tier: "cache", operation: "get", key, error: toError(error).message });
      return [];
    }
    const parsed = z.array(schema).safeParse(raw ?? []);
    return parsed.success ? parsed.data.map((entry) => Object.freeze(entry)) : [];
  }

  private notifyHighSeverity(entry: SecurityEventEntry): void {
    const userId = entry.userId;
    if (!userId || !this.users) return;
    const label = humanizeEventType(entry.eventType);

    this.users
      .findUser(userId)
      .then((user) => {
        if (!user) return;
        this.notifier.notify(
          `Security Alert: ${label}`,
          [
            "A security event has been detected:",
            "",
            `User: ${user.displayName} (${user.email})`,
            `Event: ${label}`,
            `Time: ${formatTimestamp(entry.timestamp)}`,
            `IP Address: ${entry.ip}`,
            `Additional Data: ${JSON.stringify(entry.data)}`,
          ].join("\n")
        );
      })
      .catch((error: unknown) => {
        this.eventBus.emit("NotificationFailedEvent", { subject: label, error: toError(error).message });
      });
  }
}

/** `user_agent_change` -> `User Agent Change` */
export function humanizeEventType(eventType: string): string {
  return eventType
    .split("_")
    .map((word) => (word ? word[0].toUpperCase() + word.slice(1) : word))
    .join(" ");
}
