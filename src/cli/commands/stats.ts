/**
 * sentinel stats
 */

import { Command } from "commander";
import { printTable } from "../utils/printTable";
import { withContext } from "../context";

export function statsCommand(): Command {
  const cmd = new Command("stats");
  cmd
    .description("Show login security statistics")
    .option("--json", "print raw JSON")
    .action(async (opts: { json?: boolean }) => {
      await withContext(cmd, async ({ sentinel }) => {
        const stats = await sentinel.guard.getSecurityStats();
        if (opts.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }
        printTable(
          ["METRIC", "VALUE"],
          Object.entries(stats).map(([metric, value]) => [metric, String(value)])
        );
      });
    });
  return cmd;
}
