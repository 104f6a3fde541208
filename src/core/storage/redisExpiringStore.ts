/**
 * Redis-backed expiring store.
 * Counters are updated by Lua scripts so increment-and-compare is one atomic
 * round trip, shared by every service instance pointing at the same Redis.
 */

import Redis from "ioredis";
import { ExpiringStore, IncrementResult } from "./expiringStore";

export interface RedisClient {
  get(...args: unknown[]): Promise<unknown>;
  set(...args: unknown[]): Promise<unknown>;
  del(...args: unknown[]): Promise<unknown>;
  ttl(...args: unknown[]): Promise<unknown>;
  eval(...args: unknown[]): Promise<unknown>;
  quit(...args: unknown[]): Promise<unknown>;
}

export interface RedisExpiringStoreConfig {
  prefix?: string;
  redis?: RedisClient | string;
}

export const INCREMENT_SCRIPT = `
local next = redis.call("INCR", KEYS[1])
redis.call("EXPIRE", KEYS[1], ARGV[1])
return next
`;

export const INCREMENT_IF_BELOW_SCRIPT = `
local current = tonumber(redis.call("GET", KEYS[1]) or "0") or 0
if current >= tonumber(ARGV[1]) then
  return {0, current}
end
local next = redis.call("INCR", KEYS[1])
redis.call("EXPIRE", KEYS[1], ARGV[2])
return {1, next}
`;

export class RedisExpiringStore implements ExpiringStore {
  private redis: RedisClient;
  private prefix: string;

  constructor(config: RedisExpiringStoreConfig = {}) {
    this.redis =
      typeof config.redis === "string"
        ? new Redis(config.redis)
        : (config.redis ?? new Redis());
    this.prefix = config.prefix ?? "sentinel:";
  }

  private k(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.redis.get(this.k(key));
    if (typeof raw !== "string") return undefined;
    try {
      return JSON.parse(raw);
    } catch {
      // Not written by this store; treat as absent
      return undefined;
    }
  }

  async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      await this.delete(key);
      return;
    }
    await this.redis.set(this.k(key), JSON.stringify(value), "EX", Math.ceil(ttlSeconds));
  }

  async delete(key: string): Promise<void> {
    await this.redis.del(this.k(key));
  }

  async ttl(key: string): Promise<number | undefined> {
    const remaining = await this.redis.ttl(this.k(key));
    // -2: no key, -1: no expiry set
    return typeof remaining === "number" && remaining >= 0 ? remaining : undefined;
  }

  async increment(key: string, ttlSeconds: number): Promise<number> {
    const result = await this.redis.eval(INCREMENT_SCRIPT, 1, this.k(key), Math.ceil(ttlSeconds));
    return parseInteger(result);
  }

  async incrementIfBelow(key: string, limit: number, ttlSeconds: number): Promise<IncrementResult> {
    const result = await this.redis.eval(INCREMENT_IF_BELOW_SCRIPT, 1, this.k(key), limit, Math.ceil(ttlSeconds));
    if (!Array.isArray(result) || result.length !== 2) {
      throw new Error("Unexpected Redis script response shape");
    }
    return { allowed: parseInteger(result[0]) === 1, count: parseInteger(result[1]) };
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

function parseInteger(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" && /^-?\d+$/.test(value)) return Number(value);
  throw new Error(`Unexpected Redis integer reply: ${String(value)}`);
}
