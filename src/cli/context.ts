/**
 * Builds the components a CLI command operates on
 */

import pino from "pino";
import { Command } from "commander";
import { systemClock } from "../core/clock";
import { SentinelConfig, loadConfig } from "../core/config";
import { Sentinel, createSentinel } from "../core/sentinel";
import { InMemorySessionPlatform, StaticUserDirectory } from "../server/host";

export interface CliContext {
  sentinel: Sentinel;
  platform: InMemorySessionPlatform;
  users: StaticUserDirectory;
}

export function configFrom(cmd: Command): SentinelConfig {
  const opts: { config?: unknown } = cmd.optsWithGlobals();
  return loadConfig({ file: typeof opts.config === "string" ? opts.config : undefined });
}

/**
 * @param logToStderr keep stdout for command output
 */
export function openContext(config: SentinelConfig, logToStderr = true): CliContext {
  const platform = new InMemorySessionPlatform(systemClock, config.session.maxSessionAge);
  const users = new StaticUserDirectory(config.users);
  const sentinel = createSentinel(config, {
    platform,
    users,
    logDestination: logToStderr ? pino.destination(2) : undefined,
  });
  return { sentinel, platform, users };
}

export async function withContext(cmd: Command, fn: (ctx: CliContext) => Promise<void>): Promise<void> {
  const ctx = openContext(configFrom(cmd));
  try {
    await fn(ctx);
  } finally {
    await ctx.sentinel.close();
  }
}

export function fail(message: string): never {
  console.error(message);
  process.exit(1);
}
