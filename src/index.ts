/**
 * Library entry: the guard components, their stores and the HTTP adapters.
 * The `sentinel` CLI (src/cli) is the runnable entry.
 */

export { createSentinel } from "./core/sentinel";
export type { Sentinel, SentinelOverrides } from "./core/sentinel";
export { loadConfig, SentinelConfigSchema, CONFIG_FILE_NAME } from "./core/config";
export type { SentinelConfig, LoadConfigOptions } from "./core/config";

export { systemClock, ManualClock } from "./core/clock";
export type { Clock } from "./core/clock";
export { EventBus } from "./core/eventBus";
export type { EventType, EventEnvelope, EventBusConfig } from "./core/eventBus";
export * from "./core/errors";

export {
  ClientIdentityResolver,
  DEFAULT_IP_HEADERS,
  LOOPBACK_IDENTITY,
  createRequestLifecycle,
  isPublicIp,
  isValidIp,
} from "./core/identity/clientIdentity";
export type { ClientRequest, RequestLifecycle, HeaderValue } from "./core/identity/clientIdentity";

export * from "./core/storage";
export * from "./core/rate-limit";
export * from "./core/brute-force";
export * from "./core/session";
export { SecurityEventSink, STREAMS, humanizeEventType } from "./core/events/eventSink";
export type { UserDirectory, UserProfile } from "./core/events/eventSink";
export type {
  LoginAttemptEntry,
  UserLoginEntry,
  BlockedAttemptEntry,
  SecurityEventEntry,
} from "./core/events/entries";
export { AdminNotifier, MailNotifier, NullNotifier } from "./core/notify/notifier";
export type { Notifier, SmtpConfig } from "./core/notify/notifier";
export { SentinelLogger } from "./core/logger";
export type { LoggerConfig, LogLevel, LogFormat } from "./core/logger";

export {
  createHttpServer,
  startServer,
  fromExpressRequest,
  InMemorySessionPlatform,
  StaticUserDirectory,
} from "./server";
export type { CredentialVerifier, HostSessionPlatform } from "./server";
export { checkIpBan, sessionGate, rateLimit, adminAuth } from "./server/middleware/guards";
