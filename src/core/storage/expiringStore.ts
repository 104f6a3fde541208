/**
 * Expiring key-value store contract and the in-process implementation.
 *
 * Values are JSON documents; a value is gone once its TTL elapses. Callers
 * validate what they read, a store never guarantees the shape of a value.
 */

import { Clock, systemClock } from "../clock";

export interface IncrementResult {
  allowed: boolean;
  count: number;
}

export interface ExpiringStore {
  /** `undefined` when absent or expired */
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown, ttlSeconds: number): Promise<void>;
  delete(key: string): Promise<void>;
  /** Seconds until the key expires, `undefined` when absent */
  ttl(key: string): Promise<number | undefined>;
  /** Atomic fetch-and-add; the TTL restarts on every increment */
  increment(key: string, ttlSeconds: number): Promise<number>;
  /**
   * Atomic increment-and-compare: increments only while the counter is below
   * `limit`. A refused call leaves both the count and the TTL untouched.
   */
  incrementIfBelow(key: string, limit: number, ttlSeconds: number): Promise<IncrementResult>;
}

interface Entry {
  json: string;
  expiresAt: number;
}

function toCount(value: unknown): number {
  return typeof value === "number" && Number.isFinite(value) ? value : 0;
}

export class MemoryExpiringStore implements ExpiringStore {
  private entries = new Map<string, Entry>();

  constructor(private readonly clock: Clock = systemClock) {}

  async get(key: string): Promise<unknown> {
    return this.read(key);
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    this.write(key, value, ttlSeconds);
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async ttl(key: string): Promise<number | undefined> {
    const entry = this.live(key);
    return entry ? entry.expiresAt - this.clock.now() : undefined;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const next = toCount(this.read(key)) + 1;
    this.write(key, next, ttlSeconds);
    return next;
  }

  async incrementIfBelow(key: string, limit: number, ttlSeconds: number): Promise<IncrementResult> {
    const current = toCount(this.read(key));
    if (current >= limit) {
      return { allowed: false, count: current };
    }
    this.write(key, current + 1, ttlSeconds);
    return { allowed: true, count: current + 1 };
  }

  /** Live keys, expired entries are dropped on the way */
  keys(): string[] {
    return [...this.entries.keys()].filter((key) => this.live(key) !== undefined);
  }

  clear(): void {
    this.entries.clear();
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private read(key: string): unknown {
    const entry = this.live(key);
    return entry ? JSON.parse(entry.json) : undefined;
  }

  private write(key: string, value: unknown, ttlSeconds: number): void {
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      json: JSON.stringify(value),
      expiresAt: this.clock.now() + ttlSeconds,
    });
  }
}
