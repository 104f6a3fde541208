export { MemoryExpiringStore } from "./expiringStore";
export type { ExpiringStore, IncrementResult } from "./expiringStore";
export { RedisExpiringStore } from "./redisExpiringStore";
export type { RedisClient, RedisExpiringStoreConfig } from "./redisExpiringStore";
export { MemoryDurableStore, DocumentDurableStore } from "./durableStore";
export type { DurableStore, DurableDocument } from "./durableStore";
export { FileDurableStore } from "./fileDurableStore";
export type { FileDurableStoreConfig } from "./fileDurableStore";
export { TieredStore, OptionMapTier, UserFieldTier } from "./tieredStore";
export type { DurableTier, TieredRead, DegradedHandler } from "./tieredStore";
export { KeyedMutex } from "./keyedMutex";
