/**
 * src/cli/index.ts
 * CLI entry (commander)
 */

import "dotenv/config";
import { Command } from "commander";
import { banCommand, bansCommand, unbanCommand } from "./commands/bans";
import { rulesCommand } from "./commands/rules";
import { serveCommand } from "./commands/serve";
import { statsCommand } from "./commands/stats";
import { tokenCommand } from "./commands/token";

export function createCli(): Command {
  const program = new Command();

  program
    .name("sentinel")
    .description("Login sentinel: brute-force bans, rate limits and session checks")
    .version("0.1.0")
    .option("-c, --config <path>", "configuration file (default: ./sentinel.config.json)");

  program.addCommand(serveCommand());
  program.addCommand(banCommand());
  program.addCommand(unbanCommand());
  program.addCommand(bansCommand());
  program.addCommand(statsCommand());
  program.addCommand(rulesCommand());
  program.addCommand(tokenCommand());

  return program;
}

if (require.main === module) {
  createCli()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : String(error));
      process.exit(1);
    });
}
