/**
 * Logger settings: the `logger` section of sentinel.config.json, plus the
 * source tag stamped on every line
 */

import { z } from "zod";

export const LogLevelSchema = z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);
export const LogFormatSchema = z.enum(["json", "pretty"]);

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type LogFormat = z.infer<typeof LogFormatSchema>;

export const LoggerSettingsSchema = z.object({
  level: LogLevelSchema.default("info"),
  format: LogFormatSchema.default("pretty"),
  /** JSON lines are appended here as well as to stdout */
  file: z.string().min(1).optional(),
});

export type LoggerSettings = z.infer<typeof LoggerSettingsSchema>;

export interface LoggerConfig extends LoggerSettings {
  source: string;
}

export const DEFAULT_LOG_SOURCE = "login-sentinel";

export function resolveLoggerConfig(config: Partial<LoggerConfig> = {}): LoggerConfig {
  return { ...LoggerSettingsSchema.parse(config), source: config.source ?? DEFAULT_LOG_SOURCE };
}

function fromEnv<T extends string>(schema: z.ZodType<T>, setting: string, value: string | undefined, fallback: T): T {
  if (!value) return fallback;
  const parsed = schema.safeParse(value);
  if (parsed.success) return parsed.data;
  console.warn(`Invalid log ${setting} "${value}", using default "${fallback}"`);
  return fallback;
}

/** LOG_LEVEL */
export function parseLogLevel(value: string | undefined): LogLevel {
  return fromEnv(LogLevelSchema, "level", value, "info");
}

/** LOG_FORMAT */
export function parseLogFormat(value: string | undefined): LogFormat {
  return fromEnv(LogFormatSchema, "format", value, "pretty");
}
