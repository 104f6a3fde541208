/**
 * Entry shapes of the bounded security logs
 */

import { z } from "zod";

export const LoginAttemptEntrySchema = z.object({
  ip: z.string(),
  username: z.string(),
  success: z.boolean(),
  timestamp: z.number(),
  userAgent: z.string(),
});
export type LoginAttemptEntry = z.infer<typeof LoginAttemptEntrySchema>;

export const UserLoginEntrySchema = z.object({
  userId: z.string(),
  ipAddress: z.string(),
  userAgent: z.string(),
  timestamp: z.number(),
  success: z.boolean(),
});
export type UserLoginEntry = z.infer<typeof UserLoginEntrySchema>;

export const BlockedAttemptEntrySchema = z.object({
  ip: z.string(),
  timestamp: z.number(),
  userAgent: z.string(),
  requestUri: z.string(),
});
export type BlockedAttemptEntry = z.infer<typeof BlockedAttemptEntrySchema>;

export const SecurityEventEntrySchema = z.object({
  eventType: z.string(),
  ip: z.string(),
  timestamp: z.number(),
  userId: z.string().optional(),
  userAgent: z.string().optional(),
  data: z.record(z.unknown()),
});
export type SecurityEventEntry = z.infer<typeof SecurityEventEntrySchema>;

/** Session events that page an administrator */
export const HIGH_SEVERITY_EVENTS: readonly string[] = ["concurrent_sessions", "user_agent_change"];
