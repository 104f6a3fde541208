/**
 * Minimal typed Event Bus with append-only history
 * - emits guard decisions in-process (sync)
 * - keeps a bounded in-memory history for the admin API
 */

import { ulid } from "ulid";

export type EventType =
  | "LoginSucceededEvent"
  | "LoginFailedEvent"
  | "LockoutEvent"
  | "BanEvent"
  | "UnbanEvent"
  | "BlockedRequestEvent"
  | "RateLimitedEvent"
  | "SessionCreatedEvent"
  | "SessionEndedEvent"
  | "SessionAnomalyEvent"
  | "StorageDegradedEvent"
  | "NotificationFailedEvent"
  | "ListenerErrorEvent";

export interface EventEnvelope<T = unknown> {
  id: string;
  type: EventType;
  timestamp: number;
  payload: T;
  meta?: Record<string, unknown>;
}

type Listener = (evt: EventEnvelope) => void;

export interface EventBusConfig {
  maxHistorySize?: number; // Maximum number of events in memory
  historyRetentionPolicy?: "truncate" | "circular"; // How to handle overflow
}

export class EventBus {
  private listeners: Map<EventType | "any", Set<Listener>> = new Map();
  public history: EventEnvelope[] = [];
  private config: Required<EventBusConfig>;

  constructor(config: EventBusConfig = {}) {
    this.config = {
      maxHistorySize: config.maxHistorySize ?? 1000,
      historyRetentionPolicy: config.historyRetentionPolicy ?? "truncate",
    };
  }

  on(type: EventType | "any", listener: Listener) {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
  }

  off(type: EventType | "any", listener: Listener) {
    this.listeners.get(type)?.delete(listener);
  }

  emit<T>(type: EventType, payload: T, meta?: Record<string, unknown>): EventEnvelope<T> {
    const envelope: EventEnvelope<T> = {
      id: ulid(),
      type,
      timestamp: Date.now(),
      payload,
      meta,
    };

    this.history.push(envelope);

    if (this.history.length > this.config.maxHistorySize) {
      if (this.config.historyRetentionPolicy === "truncate") {
        const excess = this.history.length - this.config.maxHistorySize;
        this.history.splice(0, excess);
      } else {
        this.history.shift();
      }
    }

    const typed = this.listeners.get(type);
    if (typed) {
      for (const l of typed) {
        try {
          l(envelope);
        } catch (e) {
          // A failing listener must not take down the guard decision
          if (type !== "ListenerErrorEvent") {
            this.emit("ListenerErrorEvent", {
              type,
              error: e instanceof Error ? e.message : String(e),
              listener: l.name || "anonymous",
            });
          }
        }
      }
    }

    const any = this.listeners.get("any");
    if (any) {
      for (const l of any) {
        try {
          l(envelope);
        } catch (e) {
          if (type !== "ListenerErrorEvent") {
            this.emit("ListenerErrorEvent", {
              type,
              error: e instanceof Error ? e.message : String(e),
              listener: "any",
            });
          }
        }
      }
    }

    return envelope;
  }

  /**
   * Get history with optional filtering
   */
  getHistory(options?: { since?: number; limit?: number; type?: EventType }): EventEnvelope[] {
    let filtered = this.history;

    const since = options?.since;
    if (since !== undefined) {
      filtered = filtered.filter((e) => e.timestamp >= since);
    }

    if (options?.type) {
      filtered = filtered.filter((e) => e.type === options.type);
    }

    if (options?.limit) {
      filtered = filtered.slice(-options.limit);
    }

    return filtered;
  }
}
