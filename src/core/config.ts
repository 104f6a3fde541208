/**
 * Runtime configuration
 *
 * Sources, lowest precedence first:
 *   1. built-in defaults (schema)
 *   2. sentinel.config.json in the working directory
 *   3. environment variables
 */

import fs from "fs";
import path from "path";
import { z } from "zod";
import { ConfigurationError } from "./errors";
import { DEFAULT_IP_HEADERS } from "./identity/clientIdentity";
import { LoggerSettingsSchema, parseLogFormat, parseLogLevel } from "./logger/config";

export const CONFIG_FILE_NAME = "sentinel.config.json";

const positiveInt = z.number().int().positive();

const RuleSchema = z.object({ limit: positiveInt, window: positiveInt });

export const SentinelConfigSchema = z.object({
  siteName: z.string().min(1).default("Login Sentinel"),
  port: z.number().int().min(0).max(65535).default(4000),
  adminEmail: z.string().email().optional(),
  jwtSecret: z.string().min(1).optional(),
  allowedOrigins: z.array(z.string()).default(["http://localhost:3000"]),
  ipHeaders: z.array(z.string().min(1)).default([...DEFAULT_IP_HEADERS]),
  bruteForce: z
    .object({
      maxAttempts: positiveInt,
      attemptWindow: positiveInt,
      attemptRetention: positiveInt,
      lockoutDuration: positiveInt,
      maxLockouts: positiveInt,
      lockoutCountWindow: positiveInt,
      banDuration: positiveInt,
    })
    .partial()
    .default({}),
  session: z
    .object({
      sessionTimeout: positiveInt,
      maxSessionAge: positiveInt,
    })
    .partial()
    .default({}),
  rateLimits: z.record(RuleSchema).default({}),
  // Accounts served by the bundled login route
  users: z
    .array(
      z.object({
        id: z.string().min(1),
        username: z.string().min(1),
        password: z.string().min(1),
        displayName: z.string().min(1),
        email: z.string().email(),
      })
    )
    .default([]),
  storage: z
    .object({
      redisUrl: z.string().min(1).optional(),
      redisPrefix: z.string().default("sentinel:"),
      dataFile: z.string().min(1).default("./data/sentinel.json"),
    })
    .default({}),
  smtp: z
    .object({
      host: z.string().min(1),
      port: positiveInt.default(587),
      user: z.string().optional(),
      password: z.string().optional(),
      from: z.string().min(1),
    })
    .optional(),
  logger: LoggerSettingsSchema.default({}),
});

export type SentinelConfig = z.infer<typeof SentinelConfigSchema>;

export interface LoadConfigOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Explicit file path; overrides `<cwd>/sentinel.config.json` */
  file?: string;
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function mergeDeep(base: PlainObject, override: PlainObject): PlainObject {
  const result: PlainObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value;
  }
  return result;
}

/**
 * Missing or unreadable file means "no file overrides"
 */
function readConfigFile(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
    return isPlainObject(parsed) ? parsed : {};
  } catch (error: unknown) {
    console.warn(`Ignoring unreadable ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return {};
  }
}

function toNumber(value: string): number {
  return Number(value.trim());
}

function setPath(target: PlainObject, keys: string[], value: unknown): void {
  let node = target;
  for (const key of keys.slice(0, -1)) {
    const next = node[key];
    if (isPlainObject(next)) {
      node = next;
    } else {
      const created: PlainObject = {};
      node[key] = created;
      node = created;
    }
  }
  node[keys[keys.length - 1]] = value;
}

const ENV_MAPPINGS: Array<[string, string[], (value: string) => unknown]> = [
  ["PORT", ["port"], toNumber],
  ["LOG_LEVEL", ["logger", "level"], parseLogLevel],
  ["LOG_FORMAT", ["logger", "format"], parseLogFormat],
  ["LOG_FILE", ["logger", "file"], (v) => v],
  ["REDIS_URL", ["storage", "redisUrl"], (v) => v],
  ["ADMIN_EMAIL", ["adminEmail"], (v) => v],
  ["JWT_SECRET", ["jwtSecret"], (v) => v],
  ["SMTP_HOST", ["smtp", "host"], (v) => v],
  ["SMTP_PORT", ["smtp", "port"], toNumber],
  ["SMTP_USER", ["smtp", "user"], (v) => v],
  ["SMTP_PASSWORD", ["smtp", "password"], (v) => v],
  ["SMTP_FROM", ["smtp", "from"], (v) => v],
  ["SENTINEL_SITE_NAME", ["siteName"], (v) => v],
  ["SENTINEL_DATA_FILE", ["storage", "dataFile"], (v) => v],
  ["SENTINEL_REDIS_PREFIX", ["storage", "redisPrefix"], (v) => v],
  ["SENTINEL_ALLOWED_ORIGINS", ["allowedOrigins"], (v) => v.split(",").map((o) => o.trim()).filter(Boolean)],
  ["SENTINEL_MAX_ATTEMPTS", ["bruteForce", "maxAttempts"], toNumber],
  ["SENTINEL_LOCKOUT_DURATION", ["bruteForce", "lockoutDuration"], toNumber],
  ["SENTINEL_MAX_LOCKOUTS", ["bruteForce", "maxLockouts"], toNumber],
  ["SENTINEL_BAN_DURATION", ["bruteForce", "banDuration"], toNumber],
  ["SENTINEL_SESSION_TIMEOUT", ["session", "sessionTimeout"], toNumber],
  ["SENTINEL_MAX_SESSION_AGE", ["session", "maxSessionAge"], toNumber],
];

export function envOverrides(env: NodeJS.ProcessEnv): PlainObject {
  const overrides: PlainObject = {};
  for (const [name, keys, convert] of ENV_MAPPINGS) {
    const value = env[name];
    if (value !== undefined && value !== "") {
      setPath(overrides, keys, convert(value));
    }
  }
  return overrides;
}

export function loadConfig(options: LoadConfigOptions = {}): SentinelConfig {
  const cwd = options.cwd ?? process.cwd();
  const filePath = options.file ?? path.join(cwd, CONFIG_FILE_NAME);
  const raw = mergeDeep(readConfigFile(filePath), envOverrides(options.env ?? process.env));

  const result = SentinelConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError("invalid settings", {
      issues: result.error.errors.map((issue) => ({ path: issue.path.join("."), message: issue.message })),
    });
  }
  return result.data;
}
