/**
 * Wires one process-wide set of components from a configuration.
 *
 * The resolver, stores and rule table are created once here and shared by
 * every component, so identity resolution and counters agree everywhere.
 */

import pino from "pino";
import { BruteForceGuard } from "./brute-force/bruteForceGuard";
import { Clock, systemClock } from "./clock";
import { SentinelConfig } from "./config";
import { EventBus } from "./eventBus";
import { SecurityEventSink, UserDirectory } from "./events/eventSink";
import { ClientIdentityResolver } from "./identity/clientIdentity";
import { SentinelLogger } from "./logger/logger";
import { AdminNotifier, MailNotifier, Notifier, NullNotifier } from "./notify/notifier";
import { RateLimiter } from "./rate-limit/rateLimiter";
import { DEFAULT_RATE_LIMIT_RULES, RateLimitRules } from "./rate-limit/rules";
import { SessionMonitor, SessionPlatform } from "./session/sessionMonitor";
import { DurableStore } from "./storage/durableStore";
import { ExpiringStore, MemoryExpiringStore } from "./storage/expiringStore";
import { FileDurableStore } from "./storage/fileDurableStore";
import { RedisExpiringStore } from "./storage/redisExpiringStore";

export interface SentinelOverrides {
  clock?: Clock;
  cache?: ExpiringStore;
  durable?: DurableStore;
  notifier?: Notifier;
  platform: SessionPlatform;
  users?: UserDirectory;
  eventBus?: EventBus;
  /** Log destination; defaults to the configured transports */
  logDestination?: pino.DestinationStream;
}

export interface Sentinel {
  config: SentinelConfig;
  clock: Clock;
  eventBus: EventBus;
  logger: SentinelLogger;
  resolver: ClientIdentityResolver;
  cache: ExpiringStore;
  durable: DurableStore;
  rules: RateLimitRules;
  rateLimiter: RateLimiter;
  sink: SecurityEventSink;
  notifier: AdminNotifier;
  guard: BruteForceGuard;
  sessions: SessionMonitor;
  close(): Promise<void>;
}

function createCache(config: SentinelConfig, clock: Clock): ExpiringStore {
  const { redisUrl, redisPrefix } = config.storage;
  return redisUrl ? new RedisExpiringStore({ redis: redisUrl, prefix: redisPrefix }) : new MemoryExpiringStore(clock);
}

function createNotifier(config: SentinelConfig): Notifier {
  return config.smtp ? new MailNotifier(config.smtp) : new NullNotifier();
}

export function createSentinel(config: SentinelConfig, overrides: SentinelOverrides): Sentinel {
  const clock = overrides.clock ?? systemClock;
  const eventBus = overrides.eventBus ?? new EventBus();
  const logger = new SentinelLogger(
    eventBus,
    { ...config.logger, source: config.siteName },
    { destination: overrides.logDestination }
  );

  const cache = overrides.cache ?? createCache(config, clock);
  const durable = overrides.durable ?? new FileDurableStore({ filePath: config.storage.dataFile });
  const resolver = new ClientIdentityResolver(config.ipHeaders);
  const rules = new RateLimitRules({ ...DEFAULT_RATE_LIMIT_RULES, ...config.rateLimits });

  const notifier = new AdminNotifier(
    overrides.notifier ?? createNotifier(config),
    { adminEmail: config.adminEmail, siteName: config.siteName },
    eventBus
  );
  const sink = new SecurityEventSink({ store: cache, eventBus, notifier, clock, users: overrides.users });

  const rateLimiter = new RateLimiter({ store: cache, rules, resolver, eventBus });
  const guard = new BruteForceGuard({
    cache,
    durable,
    resolver,
    sink,
    notifier,
    eventBus,
    clock,
    config: config.bruteForce,
  });
  const sessions = new SessionMonitor({
    cache,
    durable,
    resolver,
    sink,
    platform: overrides.platform,
    eventBus,
    clock,
    config: config.session,
  });

  return {
    config,
    clock,
    eventBus,
    logger,
    resolver,
    cache,
    durable,
    rules,
    rateLimiter,
    sink,
    notifier,
    guard,
    sessions,
    async close() {
      if (cache instanceof RedisExpiringStore) {
        await cache.close();
      }
      logger.flush();
    },
  };
}
