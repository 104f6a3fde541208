/**
 * Zod validation schemas for API routes
 */

import { z } from "zod";
import { isValidIp } from "../../core/identity/clientIdentity";

const ActionNameSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[a-z0-9_]+$/, "Action names are lower-case words joined by underscores");

export const IpSchema = z.string().trim().refine(isValidIp, "Not a valid IPv4 or IPv6 address");

// Login request - strict, no extra fields
export const LoginSchema = z
  .object({
    username: z.string().min(1).max(200),
    password: z.string().min(1).max(1024),
  })
  .strict();

export const BanRequestSchema = z
  .object({
    ip: IpSchema,
    reason: z.string().min(1).max(500).optional(),
    duration: z.number().int().positive().max(365 * 86_400).optional(),
  })
  .strict();

export const IpParamsSchema = z.object({ ip: IpSchema }).strict();

export const RuleUpdateSchema = z
  .object({
    limit: z.number().int().min(0),
    window: z.number().int().positive(),
  })
  .strict();

export const ActionParamsSchema = z.object({ action: ActionNameSchema }).strict();

export const RateLimitQuerySchema = z
  .object({
    identifier: z.string().min(1).max(200).optional(),
    userId: z.string().min(1).max(64).optional(),
  })
  .strict();

export const EventsQuerySchema = z
  .object({
    type: z
      .enum([
        "LoginSucceededEvent",
        "LoginFailedEvent",
        "LockoutEvent",
        "BanEvent",
        "UnbanEvent",
        "BlockedRequestEvent",
        "RateLimitedEvent",
        "SessionCreatedEvent",
        "SessionEndedEvent",
        "SessionAnomalyEvent",
        "StorageDegradedEvent",
        "NotificationFailedEvent",
        "ListenerErrorEvent",
      ])
      .optional(),
    limit: z.coerce.number().int().positive().max(1000).default(100),
  })
  .strict();

export const UserParamsSchema = z.object({ userId: z.string().min(1).max(64) }).strict();
