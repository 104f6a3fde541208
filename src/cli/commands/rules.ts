/**
 * sentinel rules
 */

import { Command } from "commander";
import { formatSeconds } from "../../core/logger/formatters";
import { printTable } from "../utils/printTable";
import { withContext } from "../context";

export function rulesCommand(): Command {
  const cmd = new Command("rules");
  cmd.description("List rate limit rules").action(async () => {
    await withContext(cmd, async ({ sentinel }) => {
      const rules = sentinel.rateLimiter.getRules();
      printTable(
        ["ACTION", "LIMIT", "WINDOW"],
        Object.entries(rules).map(([action, rule]) => [action, String(rule.limit), formatSeconds(rule.window)])
      );
    });
  });
  return cmd;
}
