/**
 * Two-tier record store: a fast expiring cache in front of an authoritative
 * durable tier that never expires on its own.
 *
 * Read path:
 *   cache hit, still valid  -> hit
 *   cache hit, expired      -> drop cache entry, consult durable tier
 *   durable hit, valid      -> re-seed cache with the REMAINING lifetime, hit
 *   durable hit, expired    -> purge durable entry, expired (with the record)
 *   durable read fails      -> unavailable (caller decides fail-open/closed)
 */

import { z } from "zod";
import { Clock } from "../clock";
import { toError } from "../errors";
import { DurableStore } from "./durableStore";
import { ExpiringStore } from "./expiringStore";
import { KeyedMutex } from "./keyedMutex";

export interface DurableTier<T> {
  read(key: string): Promise<T | undefined>;
  write(key: string, record: T): Promise<void>;
  remove(key: string): Promise<void>;
  /** Every record of the tier, valid or not */
  list(): Promise<Record<string, T>>;
}

export type TieredRead<T> =
  | { status: "hit"; record: T; remaining: number; source: "cache" | "durable" }
  | { status: "miss" }
  | { status: "expired"; record: T }
  | { status: "unavailable"; error: Error };

export type DegradedHandler = (tier: "cache" | "durable", operation: string, key: string, error: Error) => void;

export interface TieredStoreOptions<T> {
  cache: ExpiringStore;
  durable: DurableTier<T>;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  clock: Clock;
  /** Absolute expiry (epoch seconds) of a record */
  expiresAt: (record: T) => number;
  cacheKey: (key: string) => string;
  onDegraded?: DegradedHandler;
}

export class TieredStore<T> {
  constructor(private readonly options: TieredStoreOptions<T>) {}

  async read(key: string): Promise<TieredRead<T>> {
    const { cache, durable, clock, expiresAt, cacheKey } = this.options;
    const now = clock.now();
    const ck = cacheKey(key);

    const cached = await this.cacheGet(ck);
    if (cached !== undefined) {
      const remaining = expiresAt(cached) - now;
      if (remaining > 0) {
        return { status: "hit", record: cached, remaining, source: "cache" };
      }
      await this.cacheDelete(ck);
    }

    let stored: T | undefined;
    try {
      stored = await durable.read(key);
    } catch (error: unknown) {
      const err = toError(error);
      this.options.onDegraded?.("durable", "read", key, err);
      return { status: "unavailable", error: err };
    }
    if (stored === undefined) {
      return { status: "miss" };
    }

    const remaining = expiresAt(stored) - now;
    if (remaining > 0) {
      await this.cacheSet(ck, stored, remaining);
      return { status: "hit", record: stored, remaining, source: "durable" };
    }

    try {
      await durable.remove(key);
    } catch (error: unknown) {
      this.options.onDegraded?.("durable", "remove", key, toError(error));
    }
    await this.cacheDelete(ck);
    return { status: "expired", record: stored };
  }

  /**
   * Dual write. The cache copy is best effort; a durable failure propagates.
   */
  async write(key: string, record: T): Promise<void> {
    const remaining = this.options.expiresAt(record) - this.options.clock.now();
    await this.cacheSet(this.options.cacheKey(key), record, remaining);
    await this.options.durable.write(key, record);
  }

  async remove(key: string): Promise<void> {
    await this.cacheDelete(this.options.cacheKey(key));
    await this.options.durable.remove(key);
  }

  /**
   * Valid durable records; expired ones are purged on the way
   */
  async listValid(): Promise<Record<string, T>> {
    const all = await this.options.durable.list();
    const now = this.options.clock.now();
    const valid: Record<string, T> = {};
    for (const [key, record] of Object.entries(all)) {
      if (this.options.expiresAt(record) - now > 0) {
        valid[key] = record;
      } else {
        await this.remove(key);
      }
    }
    return valid;
  }

  private async cacheGet(key: string): Promise<T | undefined> {
    let raw: unknown;
    try {
      raw = await this.options.cache.get(key);
    } catch (error: unknown) {
      this.options.onDegraded?.("cache", "get", key, toError(error));
      return undefined;
    }
    if (raw === undefined) return undefined;
    const parsed = this.options.schema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  private async cacheSet(key: string, record: T, ttl: number): Promise<void> {
    try {
      await this.options.cache.set(key, record, ttl);
    } catch (error: unknown) {
      this.options.onDegraded?.("cache", "set", key, toError(error));
    }
  }

  private async cacheDelete(key: string): Promise<void> {
    try {
      await this.options.cache.delete(key);
    } catch (error: unknown) {
      this.options.onDegraded?.("cache", "delete", key, toError(error));
    }
  }
}

/**
 * Durable tier holding every record in a single option, keyed by record key
 */
export class OptionMapTier<T> implements DurableTier<T> {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly store: DurableStore,
    private readonly optionName: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async read(key: string): Promise<T | undefined> {
    const all = await this.list();
    return all[key];
  }

  async list(): Promise<Record<string, T>> {
    const raw = await this.store.getOption(this.optionName);
    if (raw === undefined || raw === null || typeof raw !== "object") return {};
    const records: Record<string, T> = {};
    for (const [key, value] of Object.entries(raw)) {
      const parsed = this.schema.safeParse(value);
      if (parsed.success) {
        records[key] = parsed.data;
      }
    }
    return records;
  }

  async write(key: string, record: T): Promise<void> {
    await this.mutex.runExclusive(this.optionName, async () => {
      const all = await this.list();
      all[key] = record;
      await this.store.updateOption(this.optionName, all);
    });
  }

  async remove(key: string): Promise<void> {
    await this.mutex.runExclusive(this.optionName, async () => {
      const all = await this.list();
      if (!(key in all)) return;
      delete all[key];
      await this.store.updateOption(this.optionName, all);
    });
  }
}

/**
 * Durable tier storing one record per user in a user field
 */
export class UserFieldTier<T> implements DurableTier<T> {
  constructor(
    private readonly store: DurableStore,
    private readonly field: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  async read(userId: string): Promise<T | undefined> {
    const raw = await this.store.getUserField(userId, this.field);
    if (raw === undefined) return undefined;
    const parsed = this.schema.safeParse(raw);
    return parsed.success ? parsed.data : undefined;
  }

  async write(userId: string, record: T): Promise<void> {
    await this.store.updateUserField(userId, this.field, record);
  }

  async remove(userId: string): Promise<void> {
    await this.store.deleteUserField(userId, this.field);
  }

  async list(): Promise<Record<string, T>> {
    // User fields are not enumerable through the store contract
    return {};
  }
}
