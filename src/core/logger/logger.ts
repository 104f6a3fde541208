/**
 * Sentinel Logger - Pino-based logging system
 *
 * Features:
 * - Structured JSON logging with Pino
 * - EventBus integration: every guard decision lands in the log
 * - Configurable formatting (pretty print, JSON) and an optional file sink
 * - Redaction of security event details
 */

import pino from "pino";
import { EventBus, EventEnvelope, EventType } from "../eventBus";
import { LoggerConfig, resolveLoggerConfig } from "./config";
import { createTransportTargets } from "./transports";
import { createFormatter } from "./formatters";

export interface LoggerContext {
  userId?: string;
  ip?: string;
  requestId?: string;
  action?: string;
  correlationId?: string;
  [key: string]: unknown;
}

type EventLevel = "debug" | "info" | "warn" | "error";

const EVENT_MAPPINGS: ReadonlyArray<{ event: EventType; level: EventLevel; message: string }> = [
  { event: "LoginSucceededEvent", level: "info", message: "Login succeeded" },
  { event: "LoginFailedEvent", level: "info", message: "Login failed" },
  { event: "LockoutEvent", level: "warn", message: "Identity locked out" },
  { event: "BanEvent", level: "warn", message: "Identity banned" },
  { event: "UnbanEvent", level: "info", message: "Identity unbanned" },
  { event: "BlockedRequestEvent", level: "warn", message: "Request from banned identity blocked" },
  { event: "RateLimitedEvent", level: "debug", message: "Action rate limited" },
  { event: "SessionCreatedEvent", level: "debug", message: "Session created" },
  { event: "SessionEndedEvent", level: "debug", message: "Session ended" },
  { event: "SessionAnomalyEvent", level: "warn", message: "Session anomaly" },
  { event: "StorageDegradedEvent", level: "error", message: "Storage call failed" },
  { event: "NotificationFailedEvent", level: "warn", message: "Notification failed" },
  { event: "ListenerErrorEvent", level: "error", message: "Event listener failed" },
];

// Only these keys of a security event survive into the log line
const SAFE_SECURITY_KEYS = ["userId", "ip", "userAgent", "timestamp", "action", "reason", "eventType", "duration"];

/**
 * Pino logger bound to the guard's event bus
 */
export class SentinelLogger {
  private pinoLogger: pino.Logger;
  private eventBus: EventBus;
  private config: LoggerConfig;

  /**
   * @param output.destination - write here instead of the configured transports (tests, embedding)
   * @param output.instance - reuse an existing pino logger; no bus subscription is made
   */
  constructor(
    eventBus: EventBus,
    config: Partial<LoggerConfig> = {},
    output: { destination?: pino.DestinationStream; instance?: pino.Logger } = {}
  ) {
    this.eventBus = eventBus;
    this.config = resolveLoggerConfig(config);

    if (output.instance) {
      this.pinoLogger = output.instance;
      return;
    }

    const options: pino.LoggerOptions = {
      level: this.config.level,
      formatters: createFormatter(this.config, { levelLabels: output.destination !== undefined }),
      serializers: {
        err: pino.stdSerializers.err,
      },
    };

    this.pinoLogger = output.destination
      ? pino(options, output.destination)
      : pino(options, pino.transport({ targets: createTransportTargets(this.config) }));

    this.setupEventBusIntegration();
  }

  /**
   * Create child logger with context. Children share the parent's bus subscription.
   * The log formatter only sees per-call fields, so a bound requestId gets its
   * correlationId here.
   */
  child(context: LoggerContext): SentinelLogger {
    const bindings =
      context.requestId !== undefined && context.correlationId === undefined
        ? { ...context, correlationId: context.requestId }
        : context;
    return new SentinelLogger(this.eventBus, this.config, { instance: this.pinoLogger.child(bindings) });
  }

  debug(message: string, context?: LoggerContext): void {
    this.pinoLogger.debug(context || {}, message);
  }

  info(message: string, context?: LoggerContext): void {
    this.pinoLogger.info(context || {}, message);
  }

  warn(message: string, context?: LoggerContext): void {
    this.pinoLogger.warn(context || {}, message);
  }

  error(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.error({ ...context, err: error }, error.message);
  }

  fatal(message: string | Error, context?: LoggerContext): void {
    const error = message instanceof Error ? message : new Error(message);
    this.pinoLogger.fatal({ ...context, err: error }, error.message);
  }

  /**
   * Request tracing
   */
  traceRequest(method: string, url: string, statusCode: number, duration: number, context?: LoggerContext): void {
    const level = statusCode >= 400 ? "warn" : "info";
    this.pinoLogger[level](
      {
        ...context,
        method,
        url,
        statusCode,
        duration,
        type: "request",
      },
      `${method} ${url} ${statusCode} (${duration}ms)`
    );
  }

  /**
   * Security event logging
   */
  securityEvent(event: string, details: Record<string, unknown>, context?: LoggerContext): void {
    this.warn(`Security event: ${event}`, {
      ...context,
      event,
      details: sanitizeSecurityDetails(details),
      type: "security",
    });
  }

  flush(): void {
    this.pinoLogger.flush();
  }

  private setupEventBusIntegration(): void {
    for (const { event, level, message } of EVENT_MAPPINGS) {
      this.eventBus.on(event, (evt: EventEnvelope) => {
        this.pinoLogger[level](
          {
            event,
            payload: evt.payload,
            type: "eventbus",
            correlationId: evt.id,
          },
          message
        );
      });
    }
  }
}

/**
 * Redact everything except safe metadata
 */
export function sanitizeSecurityDetails(details: Record<string, unknown>): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(details)) {
    sanitized[key] = SAFE_SECURITY_KEYS.includes(key) ? value : "[REDACTED]";
  }
  return sanitized;
}
