/**
 * sentinel token
 */

import { Command } from "commander";
import jwt from "jsonwebtoken";
import { signToken } from "../../server/auth";
import { configFrom, fail } from "../context";

export function tokenCommand(): Command {
  const cmd = new Command("token");
  cmd
    .description("Issue an admin API token")
    .option("-s, --subject <subject>", "token subject", "admin")
    .option("-e, --expires <span>", "lifetime in seconds", "3600")
    .action((opts: { subject: string; expires: string }) => {
      const config = configFrom(cmd);
      if (!config.jwtSecret) {
        fail("JWT_SECRET is not configured");
      }
      const expiresIn = Number.parseInt(opts.expires, 10);
      if (!Number.isInteger(expiresIn) || expiresIn <= 0) {
        fail(`Invalid lifetime: ${opts.expires}`);
      }
      const options: jwt.SignOptions = { expiresIn };
      console.log(signToken(opts.subject, config.jwtSecret, options));
    });
  return cmd;
}
