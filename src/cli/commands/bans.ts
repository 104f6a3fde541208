/**
 * sentinel ban | unban | bans
 */

import { Command } from "commander";
import { formatSeconds, formatTimestamp } from "../../core/logger/formatters";
import { printTable } from "../utils/printTable";
import { fail, withContext } from "../context";

export function banCommand(): Command {
  const cmd = new Command("ban");
  cmd
    .description("Ban an IP address")
    .argument("<ip>", "IPv4 or IPv6 address")
    .option("-r, --reason <reason>", "reason recorded with the ban", "Manual ban")
    .option("-d, --duration <seconds>", "ban length in seconds (default: configured ban duration)")
    .action(async (ip: string, opts: { reason: string; duration?: string }) => {
      const duration = opts.duration === undefined ? undefined : Number(opts.duration);
      await withContext(cmd, async ({ sentinel }) => {
        const result = await sentinel.guard.manualBanIp(ip, opts.reason, duration);
        if (!result.ok) {
          fail(result.error.message);
        }
        console.log(`Banned ${ip} for ${formatSeconds(result.value.duration)} (${result.value.reason})`);
      });
    });
  return cmd;
}

export function unbanCommand(): Command {
  const cmd = new Command("unban");
  cmd
    .description("Lift a ban")
    .argument("<ip>", "IPv4 or IPv6 address")
    .action(async (ip: string) => {
      await withContext(cmd, async ({ sentinel }) => {
        const result = await sentinel.guard.manualUnbanIp(ip);
        if (!result.ok) {
          fail(result.error.message);
        }
        console.log(`Unbanned ${ip}`);
      });
    });
  return cmd;
}

export function bansCommand(): Command {
  const cmd = new Command("bans");
  cmd.description("List active bans").action(async () => {
    await withContext(cmd, async ({ sentinel }) => {
      const now = sentinel.clock.now();
      const bans = Object.values(await sentinel.guard.listBans());
      printTable(
        ["IP", "REASON", "TYPE", "STARTED", "REMAINING"],
        bans.map((ban) => [
          ban.identity,
          ban.reason,
          ban.manual ? "manual" : "automatic",
          formatTimestamp(ban.startedAt),
          formatSeconds(ban.startedAt + ban.duration - now),
        ])
      );
    });
  });
  return cmd;
}
